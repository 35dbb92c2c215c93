/**
 * Axiom log provider.
 * Buffers events and ships them in batches to Axiom's ingest API.
 * A failed flush keeps the batch for the next attempt and records the
 * failure on `lastFlushError`; logging never throws into callers.
 */

import { isLevelEnabled, type ILogProvider, type LogEvent, type LogLevel } from './ILogProvider.js';

export interface AxiomLogProviderOptions {
  /** Axiom API token (Bearer). Empty string disables sending. */
  apiToken: string;
  /** Axiom dataset name. */
  dataset: string;
  /** Stamped on every event as `service`. Default: 'idea-ledger'. */
  service?: string;
  /** Drop events below this level. Default: 'info'. */
  minLevel?: LogLevel;
  /** Flush after this many buffered events. Default: 50. */
  flushThreshold?: number;
  /** Auto-flush interval in ms. Default: 10_000. 0 disables. */
  flushIntervalMs?: number;
  /** Oldest events are dropped past this size. Default: 1000. */
  maxBufferSize?: number;
}

const AXIOM_INGEST_URL = 'https://api.axiom.co/v1/datasets';

interface AxiomEvent extends LogEvent {
  service: string;
}

export class AxiomLogProvider implements ILogProvider {
  /** Most recent flush failure, cleared by the next successful flush. */
  lastFlushError: Error | null = null;

  private buffer: AxiomEvent[] = [];
  private readonly apiToken: string;
  private readonly dataset: string;
  private readonly service: string;
  private readonly minLevel: LogLevel;
  private readonly flushThreshold: number;
  private readonly maxBufferSize: number;
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private readonly enabled: boolean;

  constructor(options: AxiomLogProviderOptions) {
    this.apiToken = options.apiToken;
    this.dataset = options.dataset;
    this.service = options.service ?? 'idea-ledger';
    this.minLevel = options.minLevel ?? 'info';
    this.flushThreshold = options.flushThreshold ?? 50;
    this.maxBufferSize = options.maxBufferSize ?? 1000;
    this.enabled = Boolean(this.apiToken);

    const flushIntervalMs = options.flushIntervalMs ?? 10_000;
    if (this.enabled && flushIntervalMs > 0) {
      this.flushTimer = setInterval(() => {
        void this.flush();
      }, flushIntervalMs);
      this.flushTimer.unref();
    }
  }

  /** Number of events waiting to be shipped. */
  get pending(): number {
    return this.buffer.length;
  }

  log(event: LogEvent): void {
    if (!this.enabled || !isLevelEnabled(event.level, this.minLevel)) return;

    this.buffer.push({
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
      service: this.service,
    });

    if (this.buffer.length > this.maxBufferSize) {
      this.buffer.splice(0, this.buffer.length - this.maxBufferSize);
    }

    if (this.buffer.length >= this.flushThreshold) {
      void this.flush();
    }
  }

  async flush(): Promise<void> {
    if (!this.enabled || this.buffer.length === 0) return;

    const batch = [...this.buffer];

    try {
      const response = await fetch(`${AXIOM_INGEST_URL}/${this.dataset}/ingest`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiToken}`,
        },
        body: JSON.stringify(batch),
      });

      if (!response.ok) {
        this.lastFlushError = new Error(`Axiom ingest responded ${response.status}`);
        return;
      }

      this.removeShipped(batch);
      this.lastFlushError = null;
    } catch (err) {
      this.lastFlushError = err instanceof Error ? err : new Error(String(err));
    }
  }

  /** Stop the auto-flush timer and flush remaining events. */
  async dispose(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.flush();
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }

  // Events logged during the request stay buffered; trimming may already
  // have dropped part of the batch.
  private removeShipped(batch: AxiomEvent[]): void {
    const shipped = new Set(batch);
    this.buffer = this.buffer.filter((e) => !shipped.has(e));
  }
}
