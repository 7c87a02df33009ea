// Types
export type {
  BandRange,
  BandPlan,
  BandPlanError,
} from './types.ts';

// Constants
export {
  UNKNOWN_BAND,
  HZ_PER_MHZ,
  BAND_FIELD_SEPARATOR,
} from './constants.ts';

// Band plan
export {
  parseBandLine,
  parseBandPlan,
  createBandPlan,
  classifyFrequency,
  formatMHz,
} from './band-plan.ts';

// Data loading
export {
  loadBandPlanFile,
  loadDefaultBandPlan,
} from './data.ts';
