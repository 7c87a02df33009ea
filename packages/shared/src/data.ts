import { readFileSync } from 'node:fs';
import { Result } from 'neverthrow';
import type { BandPlan, BandPlanError } from './types.ts';
import { parseBandPlan } from './band-plan.ts';

const DEFAULT_BAND_FILE = new URL('../data/bands.txt', import.meta.url);

const readText = Result.fromThrowable(
  (path: string | URL) => readFileSync(path, 'utf8'),
  (error): BandPlanError => ({
    type: 'LOAD_ERROR',
    message: error instanceof Error ? error.message : 'Unknown read error',
  })
);

/**
 * Loads a user-editable band file. Malformed lines are skipped; a file
 * that cannot be read or yields no ranges is a load error.
 */
export function loadBandPlanFile(path: string | URL): Result<BandPlan, BandPlanError> {
  return readText(path)
    .andThen(parseBandPlan)
    .mapErr((error): BandPlanError => ({
      type: error.type,
      message: `Failed to load band plan from ${String(path)}: ${error.message}`,
    }));
}

export function loadDefaultBandPlan(): Result<BandPlan, BandPlanError> {
  return loadBandPlanFile(DEFAULT_BAND_FILE);
}
