export interface BandRange {
  name: string;
  startMHz: number;
  endMHz: number;
}

export interface BandPlan {
  readonly ranges: readonly BandRange[];
}

export type BandPlanError = { type: 'LOAD_ERROR'; message: string };
