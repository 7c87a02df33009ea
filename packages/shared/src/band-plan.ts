import { Result, ok, err } from 'neverthrow';
import type { BandPlan, BandPlanError, BandRange } from './types.ts';
import { BAND_FIELD_SEPARATOR, HZ_PER_MHZ, UNKNOWN_BAND } from './constants.ts';

function parseBound(field: string): number | null {
  const trimmed = field.trim();
  if (trimmed === '') return null;
  const value = Number(trimmed);
  return Number.isFinite(value) && value > 0 ? value : null;
}

function isValidRange(range: BandRange): boolean {
  return (
    range.name.trim() !== '' &&
    Number.isFinite(range.startMHz) &&
    Number.isFinite(range.endMHz) &&
    range.startMHz > 0 &&
    range.startMHz < range.endMHz
  );
}

/**
 * Parses one `name:start:end` line of a band file.
 * Returns null for blank lines, comments and anything malformed.
 */
export function parseBandLine(line: string): BandRange | null {
  const trimmed = line.trim();
  if (trimmed === '' || trimmed.startsWith('#')) return null;

  const parts = trimmed.split(BAND_FIELD_SEPARATOR);
  if (parts.length !== 3) return null;

  const [name = '', start = '', end = ''] = parts;
  const startMHz = parseBound(start);
  const endMHz = parseBound(end);
  if (startMHz === null || endMHz === null) return null;

  const range: BandRange = { name: name.trim(), startMHz, endMHz };
  return isValidRange(range) ? range : null;
}

/**
 * Builds an immutable band plan. Invalid ranges are dropped; a plan with
 * nothing left is a load error.
 */
export function createBandPlan(ranges: readonly BandRange[]): Result<BandPlan, BandPlanError> {
  const valid = ranges.filter(isValidRange).map((range) => Object.freeze({ ...range }));

  if (valid.length === 0) {
    return err({
      type: 'LOAD_ERROR',
      message: 'Band plan contains no valid ranges',
    });
  }

  return ok(Object.freeze({ ranges: Object.freeze(valid) }));
}

export function parseBandPlan(text: string): Result<BandPlan, BandPlanError> {
  const ranges: BandRange[] = [];
  for (const line of text.split(/\r?\n/)) {
    const range = parseBandLine(line);
    if (range) ranges.push(range);
  }
  return createBandPlan(ranges);
}

// First matching range wins, bounds inclusive on both ends
export function classifyFrequency(plan: BandPlan, frequencyHz: number): string {
  const freqMHz = frequencyHz / HZ_PER_MHZ;
  for (const range of plan.ranges) {
    if (freqMHz >= range.startMHz && freqMHz <= range.endMHz) {
      return range.name;
    }
  }
  return UNKNOWN_BAND;
}

export function formatMHz(frequencyHz: number): string {
  return (frequencyHz / HZ_PER_MHZ).toFixed(3);
}
