import { setTimeout as delay } from 'node:timers/promises';
import { ResultAsync, type Result } from 'neverthrow';
import { classifyFrequency, formatMHz, UNKNOWN_BAND, type BandPlan } from '@bandwatch/shared';
import type { BandNotifier, FrequencySource, Logger, MonitorError, Sleep, TickOutcome } from './types.ts';
import { errorMessage, fetchError, formatDuration, formatError, notifyError } from './utils.ts';

export interface BandMonitorOptions {
  plan: BandPlan;
  source: FrequencySource;
  notifier: BandNotifier;
  intervalMs: number;
  logger?: Logger;
  sleep?: Sleep;
}

// Longest delay a Node timer honours; anything above it fires after 1ms
export const MAX_TIMER_MS = 2_147_483_647;

// Resolves early, without throwing, when the signal aborts
export async function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  let remaining = ms;
  try {
    while (remaining > 0) {
      const chunk = Math.min(remaining, MAX_TIMER_MS);
      await delay(chunk, undefined, { signal });
      remaining -= chunk;
    }
  } catch (error) {
    if (signal?.aborted) return;
    throw error;
  }
}

/**
 * Polls a frequency source and fires the notifier whenever the classified
 * band changes.
 *
 * Unknown readings are ignored entirely: they neither replace the last band
 * nor count as a change, so `40m, unknown, 40m` is silent and
 * `40m, unknown, 20m` is a single 40m -> 20m transition. The first known band
 * is only reported. A failed notification still advances the last band.
 */
export class BandMonitor {
  private readonly plan: BandPlan;
  private readonly source: FrequencySource;
  private readonly notifier: BandNotifier;
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private lastBand: string | null = null;

  constructor(options: BandMonitorOptions) {
    if (!(options.intervalMs > 0)) {
      throw new RangeError(`Poll interval must be positive, got ${options.intervalMs}`);
    }
    this.plan = options.plan;
    this.source = options.source;
    this.notifier = options.notifier;
    this.intervalMs = options.intervalMs;
    this.logger = options.logger ?? console;
    this.sleep = options.sleep ?? abortableSleep;
  }

  get currentBand(): string | null {
    return this.lastBand;
  }

  // A rejected collaborator promise counts as that collaborator's error
  private read(): ResultAsync<number, MonitorError> {
    return ResultAsync.fromThrowable(this.source, (error) =>
      fetchError(errorMessage(error, 'Unknown fetch error'))
    )().andThen((reading) => reading);
  }

  private notify(band: string): ResultAsync<void, MonitorError> {
    return ResultAsync.fromThrowable(this.notifier, (error) =>
      notifyError(errorMessage(error, 'Unknown notify error'))
    )(band).andThen((notified) => notified);
  }

  async tick(): Promise<TickOutcome> {
    const reading: Result<number, MonitorError> = await this.read();
    if (reading.isErr()) {
      this.logger.error(`Error getting frequency: ${formatError(reading.error)}`);
      return { type: 'FETCH_FAILED', error: reading.error };
    }

    const frequencyHz = reading.value;
    const band = classifyFrequency(this.plan, frequencyHz);

    if (band === UNKNOWN_BAND) {
      return { type: 'UNKNOWN', frequencyHz };
    }

    const previous = this.lastBand;
    if (previous === null) {
      this.lastBand = band;
      this.logger.log(`Initial band detected: ${band} (${formatMHz(frequencyHz)} MHz)`);
      return { type: 'INITIAL', band, frequencyHz };
    }

    if (band === previous) {
      return { type: 'UNCHANGED', band, frequencyHz };
    }

    this.logger.log(`Band changed from ${previous} to ${band} (${formatMHz(frequencyHz)} MHz)`);
    const notified: Result<void, MonitorError> = await this.notify(band);
    this.lastBand = band;

    return notified.match(
      (): TickOutcome => ({ type: 'CHANGED', from: previous, to: band, frequencyHz, notifyError: null }),
      (error): TickOutcome => {
        this.logger.error(`Error running external command: ${formatError(error)}`);
        return { type: 'CHANGED', from: previous, to: band, frequencyHz, notifyError: error };
      }
    );
  }

  /**
   * Polls until the signal aborts. Without a signal this never returns.
   */
  async run(signal?: AbortSignal): Promise<void> {
    this.logger.log(`Starting band monitor (interval: ${formatDuration(this.intervalMs)})`);

    while (!signal?.aborted) {
      await this.tick();
      if (signal?.aborted) break;
      await this.sleep(this.intervalMs, signal);
    }
  }
}
