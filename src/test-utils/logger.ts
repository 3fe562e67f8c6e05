/**
 * Recording logger for assertions on notices.
 */

import type { Logger } from '../utils/logger.js';

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export interface LogEntry {
  level: LogLevel;
  message: string;
}

export class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  info = (message: string): void => {
    this.entries.push({ level: 'info', message });
  };

  warn = (message: string): void => {
    this.entries.push({ level: 'warn', message });
  };

  error = (message: string): void => {
    this.entries.push({ level: 'error', message });
  };

  debug = (message: string): void => {
    this.entries.push({ level: 'debug', message });
  };

  /** Messages logged at one level, in order */
  messages(level: LogLevel): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
