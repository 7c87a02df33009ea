import type { MonitorError } from './types.ts';

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const DURATION_PART = /(\d+(?:\.\d+)?|\.\d+)(ms|s|m|h)/y;

/**
 * Parses a Go-style duration ("500ms", "5s", "1m30s", "1.5h") into
 * milliseconds. Returns null when the text is not a duration.
 */
export function parseDuration(text: string): number | null {
  const input = text.trim();
  if (input === '') return null;

  DURATION_PART.lastIndex = 0;
  let total = 0;
  while (DURATION_PART.lastIndex < input.length) {
    const match = DURATION_PART.exec(input);
    if (!match) return null;
    const [, amount = '', unit = ''] = match;
    const scale = UNIT_MS[unit];
    if (scale === undefined) return null;
    total += Number(amount) * scale;
  }
  return total;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;

  let rest = ms;
  let out = '';
  for (const unit of ['h', 'm', 's'] as const) {
    const scale = UNIT_MS[unit] ?? 1;
    const whole = Math.floor(rest / scale);
    if (whole > 0) {
      out += `${whole}${unit}`;
      rest -= whole * scale;
    }
  }
  if (rest > 0) out += `${rest}ms`;
  return out;
}

export function formatError(error: { type: string; message: string }): string {
  return `[${error.type}] ${error.message}`;
}

export function errorMessage(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}

export function fetchError(message: string): MonitorError {
  return { type: 'FETCH_ERROR', message };
}

export function parseError(message: string): MonitorError {
  return { type: 'PARSE_ERROR', message };
}

export function notifyError(message: string): MonitorError {
  return { type: 'NOTIFY_ERROR', message };
}
