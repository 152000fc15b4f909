/**
 * Leveled, source-filtered console logger.
 *
 * Every call names its source ("Router", "Lifecycle", a node id).
 * Resolution order for each message:
 *   1. below the level threshold → hidden
 *   2. solo non-empty → shown only if a solo pattern matches
 *   3. matches hide → hidden
 *   4. show non-empty and no match → hidden
 *   5. shown
 */

import { describeError } from '../errors';
import { matchesAny } from './patterns';

export type LogLevel = 'error' | 'warn' | 'info' | 'trace';

export const LOG_LEVELS: ReadonlyArray<LogLevel> = ['trace', 'info', 'warn', 'error'];

const PRIORITY: Record<LogLevel, number> = {
  trace: 1,
  info: 2,
  warn: 3,
  error: 4
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export interface LoggerConfig {
  level: LogLevel;
  show: string[];
  hide: string[];
  solo: string[];
  groups: Record<string, string[]>;
}

/**
 * Destination for formatted log lines
 */
export interface LogSink {
  write(level: LogLevel, source: string, message: string): void;
}

export const consoleSink: LogSink = {
  write(level, source, message) {
    const line = `[${level.toUpperCase()}] ${source}: ${message}`;
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
};

function formatArg(arg: unknown): string {
  if (typeof arg === 'string') return arg;
  if (arg instanceof Error) return arg.message;
  if (typeof arg === 'object' && arg !== null) return describeError(arg);
  return String(arg);
}

export class Logger {
  private config: LoggerConfig = {
    level: 'info',
    show: [],
    hide: [],
    solo: [],
    groups: {}
  };

  constructor(config: Partial<LoggerConfig> = {}, private sink: LogSink = consoleSink) {
    this.configure(config);
  }

  /**
   * Merge new settings over the current ones. Lists are replaced, not appended.
   */
  configure(config: Partial<LoggerConfig>): void {
    this.config = {
      level: config.level ?? this.config.level,
      show: config.show ? [...config.show] : this.config.show,
      hide: config.hide ? [...config.hide] : this.config.hide,
      solo: config.solo ? [...config.solo] : this.config.solo,
      groups: config.groups ? { ...this.config.groups, ...config.groups } : this.config.groups
    };
  }

  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  getConfig(): LoggerConfig {
    return {
      ...this.config,
      show: [...this.config.show],
      hide: [...this.config.hide],
      solo: [...this.config.solo],
      groups: { ...this.config.groups }
    };
  }

  shouldLog(source: string, level: LogLevel): boolean {
    if (PRIORITY[level] < PRIORITY[this.config.level]) return false;

    const { show, hide, solo, groups } = this.config;
    if (solo.length > 0) return matchesAny(source, solo, groups);
    if (matchesAny(source, hide, groups)) return false;
    if (show.length > 0) return matchesAny(source, show, groups);
    return true;
  }

  error(source: string, ...args: unknown[]): void {
    this.log('error', source, args);
  }

  warn(source: string, ...args: unknown[]): void {
    this.log('warn', source, args);
  }

  info(source: string, ...args: unknown[]): void {
    this.log('info', source, args);
  }

  trace(source: string, ...args: unknown[]): void {
    this.log('trace', source, args);
  }

  private log(level: LogLevel, source: string, args: unknown[]): void {
    if (!this.shouldLog(source, level)) return;
    this.sink.write(level, source, args.map(formatArg).join(' '));
  }
}

/**
 * Sink that keeps lines in memory; handy for assertions
 */
export class MemoryLogSink implements LogSink {
  readonly lines: Array<{ level: LogLevel; source: string; message: string }> = [];

  write(level: LogLevel, source: string, message: string): void {
    this.lines.push({ level, source, message });
  }

  messages(level?: LogLevel): string[] {
    return this.lines
      .filter(line => level === undefined || line.level === level)
      .map(line => `${line.source}: ${line.message}`);
  }

  clear(): void {
    this.lines.length = 0;
  }
}
