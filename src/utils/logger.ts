import * as fs from 'fs';
import * as path from 'path';
import type { LogEntry, LogLevel } from '../agent/core/types.js';

export interface LoggerOptions {
  /** JSONL file every entry is appended to */
  logFile?: string;
  /** Subscriber for every entry (worker mode relays these to Redis Pub/Sub) */
  onLog?: (entry: LogEntry) => void;
  /** Suppress console output (tests) */
  silent?: boolean;
}

export class CampaignLogger {
  private logFile?: string;
  private onLog?: (entry: LogEntry) => void;
  private silent: boolean;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile;
    this.onLog = options.onLog;
    this.silent = options.silent ?? false;

    if (this.logFile) {
      fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
    }
  }

  /**
   * Swap the subscriber, e.g. when the worker moves on to the next task.
   */
  setOnLog(onLog: ((entry: LogEntry) => void) | undefined): void {
    this.onLog = onLog;
  }

  log(level: LogLevel, component: string, message: string, data?: unknown): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
      data,
    };

    if (this.logFile) {
      fs.appendFileSync(this.logFile, JSON.stringify(entry) + '\n');
    }
    if (!this.silent) {
      const line = `[${component}] ${message}`;
      if (level === 'WARN' || level === 'ERROR') {
        console.error(line, data ?? '');
      } else {
        console.log(line);
      }
    }
    this.onLog?.(entry);
  }

  info(component: string, message: string, data?: unknown): void {
    this.log('INFO', component, message, data);
  }

  step(component: string, message: string, data?: unknown): void {
    this.log('STEP', component, message, data);
  }

  result(component: string, message: string, data?: unknown): void {
    this.log('RESULT', component, message, data);
  }

  vuln(component: string, message: string, data?: unknown): void {
    this.log('VULN', component, message, data);
  }

  warn(component: string, message: string, data?: unknown): void {
    this.log('WARN', component, message, data);
  }

  error(component: string, message: string, data?: unknown): void {
    this.log('ERROR', component, message, data);
  }
}
