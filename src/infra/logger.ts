import fs from 'node:fs/promises';
import path from 'node:path';
import { isoNow } from '../utils/time.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  ts: string;
  level: LogLevel;
  event: string;
  [field: string]: unknown;
}

const jsonSafe = (_key: string, value: unknown): unknown => (
  typeof value === 'bigint' ? value.toString() : value
);

/**
 * Append-only NDJSON event log. Writes are chained so lines never
 * interleave. A failed append goes to stderr; `log` itself never rejects,
 * since its callers have already committed.
 */
export class EventLogger {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly logFilePath: string) {}

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.logFilePath), { recursive: true });
  }

  async log(level: LogLevel, event: string, fields: Record<string, unknown> = {}): Promise<void> {
    const entry: LogEntry = { ...fields, ts: isoNow(), level, event };
    const line = `${JSON.stringify(entry, jsonSafe)}\n`;

    this.queue = this.queue
      .then(() => fs.appendFile(this.logFilePath, line, 'utf-8'))
      .catch((error: unknown) => {
        console.error(`[logger] failed to append ${event}:`, error);
      });
    await this.queue;
  }

  async flush(): Promise<void> {
    await this.queue;
  }
}
