import fs from 'node:fs/promises';
import path from 'node:path';
import { toPlain } from '../utils/json.js';
import { isoNow } from '../utils/time.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogRecord {
  ts: string;
  level: LogLevel;
  event: string;
  data: unknown;
}

/**
 * Append-only ndjson event log. One line per record; bigint amounts are
 * written as decimal strings.
 */
export class EventLogger {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly logFilePath: string) {}

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.logFilePath), { recursive: true });
  }

  async log(level: LogLevel, event: string, data: Record<string, unknown>): Promise<void> {
    const record: LogRecord = {
      ts: isoNow(),
      level,
      event,
      data: toPlain(data),
    };
    const line = `${JSON.stringify(record)}\n`;

    // keep lines in call order when callers do not await
    const write = this.queue.then(() => fs.appendFile(this.logFilePath, line));
    this.queue = write.catch(() => undefined);
    await write;
  }

  async tail(limit = 50): Promise<LogRecord[]> {
    await this.queue;
    let raw: string;
    try {
      raw = await fs.readFile(this.logFilePath, 'utf-8');
    } catch {
      return [];
    }
    return raw
      .split('\n')
      .filter(Boolean)
      .slice(-limit)
      .map((line) => JSON.parse(line) as LogRecord);
  }
}
