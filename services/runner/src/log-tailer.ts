import { logger, sleep, isAbortError } from '@ecsrun/shared';
import type { LogBackend } from './backends.js';
import { errorMessage } from './errors.js';
import type { LogEntry } from './types.js';

const log = logger.child({ module: 'log-tailer' });

export const DEFAULT_POLL_INTERVAL_MS = 1000;
/** How long a completed tailer keeps looking for its sentinel; covers CloudWatch ingestion lag. */
export const DEFAULT_DRAIN_MS = 30_000;

export type TailOutcome = 'sentinel' | 'cancelled' | 'failed' | 'drained';

/** Called once per fetched entry; returning false marks the entry as the sentinel. */
export type ShouldContinue = (entry: LogEntry) => boolean;

export interface LogTailerOptions {
  logs: LogBackend;
  logGroup: string;
  logStream: string;
  shouldContinue: ShouldContinue;
  pollIntervalMs?: number;
  /** Time allowed after `complete()` before giving up on the sentinel. */
  drainMs?: number;
}

/**
 * Follows a single log stream from its head until the predicate rejects an
 * entry, the signal aborts, a fetch fails, or the drain window closes.
 *
 * Delivery to the predicate is at-least-once and in stream order.
 */
export class LogTailer {
  readonly logGroup: string;
  readonly logStream: string;
  private readonly logs: LogBackend;
  private readonly shouldContinue: ShouldContinue;
  private readonly pollIntervalMs: number;
  private readonly drainMs: number;
  private completedAt: number | undefined;

  constructor(opts: LogTailerOptions) {
    this.logs = opts.logs;
    this.logGroup = opts.logGroup;
    this.logStream = opts.logStream;
    this.shouldContinue = opts.shouldContinue;
    this.pollIntervalMs = opts.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.drainMs = opts.drainMs ?? DEFAULT_DRAIN_MS;
  }

  /**
   * Signals that the container is known to have finished. The sentinel is
   * still awaited, but only for `drainMs`; at least one more fetch is made.
   */
  complete(): void {
    if (this.completedAt === undefined) this.completedAt = Date.now();
  }

  async watch(signal?: AbortSignal): Promise<TailOutcome> {
    let nextToken: string | undefined;

    for (;;) {
      if (signal?.aborted) return this.cancelled();

      const completedAt = this.completedAt;
      let events: LogEntry[];
      try {
        const page = await this.logs.fetchEvents(this.logGroup, this.logStream, nextToken, signal);
        events = page.events;
        nextToken = page.nextToken ?? nextToken;
      } catch (err) {
        if (signal?.aborted || isAbortError(err)) return this.cancelled();
        log.error({ logStream: this.logStream, error: errorMessage(err) }, 'log fetch failed, stopping tailer');
        return 'failed';
      }

      for (const entry of events) {
        if (!this.shouldContinue(entry)) {
          log.info({ logStream: this.logStream, message: entry.message }, 'sentinel found');
          return 'sentinel';
        }
      }

      if (completedAt !== undefined && Date.now() - completedAt >= this.drainMs) {
        log.warn({ logStream: this.logStream, drainMs: this.drainMs }, 'finish marker not seen before drain window closed');
        return 'drained';
      }

      try {
        await sleep(this.pollIntervalMs, signal);
      } catch (err) {
        if (isAbortError(err)) return this.cancelled();
        throw err;
      }
    }
  }

  private cancelled(): TailOutcome {
    log.debug({ logStream: this.logStream }, 'tailer cancelled');
    return 'cancelled';
  }
}
