import type { Result } from 'neverthrow';

export type MonitorError =
  | { type: 'FETCH_ERROR'; message: string }
  | { type: 'PARSE_ERROR'; message: string }
  | { type: 'NOTIFY_ERROR'; message: string };

export type ConfigError = { type: 'CONFIG_ERROR'; message: string };

// Reads the current VFO frequency in hertz
export type FrequencySource = () => Promise<Result<number, MonitorError>>;

// Acts on a band change; called with the new band name
export type BandNotifier = (band: string) => Promise<Result<void, MonitorError>>;

export type Logger = Pick<Console, 'log' | 'error'>;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type TickOutcome =
  | { type: 'FETCH_FAILED'; error: MonitorError }
  | { type: 'UNKNOWN'; frequencyHz: number }
  | { type: 'INITIAL'; band: string; frequencyHz: number }
  | { type: 'CHANGED'; from: string; to: string; frequencyHz: number; notifyError: MonitorError | null }
  | { type: 'UNCHANGED'; band: string; frequencyHz: number };

export interface MonitorConfig {
  host: string;
  port: number;
  intervalMs: number;
  command: string;
  bandsFile: string | null;
}

export interface CliOptions extends Omit<MonitorConfig, 'command'> {
  command: string | null;
  listMethods: boolean;
  help: boolean;
}
