import * as fs from 'fs';
import * as path from 'path';
import { errorMessage } from './errors';
import type { Logger } from './types';

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export interface LoggerOptions {
  /** Appends to this file; lines go to stdout when omitted. */
  file?: string;
  verbose?: boolean;
  now?: () => Date;
}

export class LineLogger implements Logger {
  private readonly verbose: boolean;
  private readonly now: () => Date;

  constructor(private readonly options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.now = options.now ?? (() => new Date());
    if (options.file) {
      fs.mkdirSync(path.dirname(options.file), { recursive: true });
    }
  }

  log(message: string): void {
    const line = `[${formatTimestamp(this.now())}] ${message}`;
    if (!this.options.file) {
      console.log(line);
      return;
    }
    try {
      fs.appendFileSync(this.options.file, `${line}\n`);
    } catch (error) {
      // a log line must never take a loop down with it
      console.error(`${line} (log file unavailable: ${errorMessage(error)})`);
    }
  }

  debug(message: string): void {
    if (this.verbose) {
      this.log(message);
    }
  }
}

/** Prefixes every message with `[tag] `, like the rest of the daemon's output. */
export function taggedLogger(logger: Logger, tag: string): Logger {
  return {
    log: (message) => logger.log(`[${tag}] ${message}`),
    debug: (message) => logger.debug(`[${tag}] ${message}`),
  };
}
