/**
 * Leveled logger utility for the actuator agent.
 *
 * Loggers are named with dotted paths (`actuator.registration`). A logger
 * without a configured level inherits the level of its nearest configured
 * ancestor, ending at `ROOT`. Every emitted line is written to the console and
 * to each registered sink.
 */

import { format } from 'util';
import { LEVEL_NAMES, LevelName } from '../../types';

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  FATAL = 5,
  OFF = 6
}

export const ROOT_LOGGER_NAME = 'ROOT';

export interface LogSink {
  append(line: string): void;
}

export function levelName(level: LogLevel): LevelName {
  return LEVEL_NAMES[level];
}

const LEVELS_BY_NAME: Record<LevelName, LogLevel> = {
  TRACE: LogLevel.TRACE,
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARN,
  ERROR: LogLevel.ERROR,
  FATAL: LogLevel.FATAL,
  OFF: LogLevel.OFF
};

export function isLevelName(name: string): name is LevelName {
  return LEVEL_NAMES.some(candidate => candidate === name);
}

export function parseLevel(name: string): LogLevel | undefined {
  const upper = name.toUpperCase();
  return isLevelName(upper) ? LEVELS_BY_NAME[upper] : undefined;
}

export function parentName(name: string): string {
  const lastDot = name.lastIndexOf('.');
  return lastDot === -1 ? ROOT_LOGGER_NAME : name.slice(0, lastDot);
}

export class Logger {
  constructor(readonly name: string, private readonly hierarchy: LoggerHierarchy) {}

  isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.OFF && level >= this.hierarchy.getEffectiveLevel(this.name);
  }

  trace(message: string, ...args: unknown[]): void {
    this.log(LogLevel.TRACE, message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log(LogLevel.DEBUG, message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log(LogLevel.INFO, message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log(LogLevel.WARN, message, args);
  }

  error(message: string, error?: unknown, ...args: unknown[]): void {
    this.log(LogLevel.ERROR, message, error === undefined ? args : [error, ...args]);
  }

  fatal(message: string, error?: unknown, ...args: unknown[]): void {
    this.log(LogLevel.FATAL, message, error === undefined ? args : [error, ...args]);
  }

  child(suffix: string): Logger {
    return this.hierarchy.getLogger(this.name === ROOT_LOGGER_NAME ? suffix : `${this.name}.${suffix}`);
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (this.isEnabled(level)) {
      this.hierarchy.emit(this.name, level, message, args);
    }
  }
}

export class LoggerHierarchy {
  private loggers: Map<string, Logger> = new Map();
  private configured: Map<string, LogLevel> = new Map();
  private sinks: Set<LogSink> = new Set();
  private consoleEnabled: boolean = true;

  constructor(private readonly defaultRootLevel: LogLevel = LogLevel.INFO) {
    this.configured.set(ROOT_LOGGER_NAME, defaultRootLevel);
    this.getLogger(ROOT_LOGGER_NAME);
  }

  getLogger(name: string): Logger {
    let existing = this.loggers.get(name);
    if (!existing) {
      existing = new Logger(name, this);
      this.loggers.set(name, existing);
    }
    return existing;
  }

  has(name: string): boolean {
    return this.loggers.has(name);
  }

  names(): string[] {
    return [...this.loggers.keys()].sort((a, b) => {
      if (a === ROOT_LOGGER_NAME) return -1;
      if (b === ROOT_LOGGER_NAME) return 1;
      return a.localeCompare(b);
    });
  }

  /**
   * Passing `undefined` clears the configured level; for ROOT that means the
   * default level the hierarchy was built with.
   */
  setLevel(name: string, level: LogLevel | undefined): void {
    this.getLogger(name);
    if (level !== undefined) {
      this.configured.set(name, level);
    } else if (name === ROOT_LOGGER_NAME) {
      this.configured.set(ROOT_LOGGER_NAME, this.defaultRootLevel);
    } else {
      this.configured.delete(name);
    }
  }

  getConfiguredLevel(name: string): LogLevel | undefined {
    return this.configured.get(name);
  }

  getEffectiveLevel(name: string): LogLevel {
    let current = name;
    for (;;) {
      const level = this.configured.get(current);
      if (level !== undefined) {
        return level;
      }
      if (current === ROOT_LOGGER_NAME) {
        return this.defaultRootLevel;
      }
      current = parentName(current);
    }
  }

  addSink(sink: LogSink): void {
    this.sinks.add(sink);
  }

  removeSink(sink: LogSink): void {
    this.sinks.delete(sink);
  }

  setConsoleEnabled(enabled: boolean): void {
    this.consoleEnabled = enabled;
  }

  emit(name: string, level: LogLevel, message: string, args: unknown[]): void {
    const line = `[${levelName(level)}] ${new Date().toISOString()} - ${name} - ${format(message, ...args)}`;

    if (this.consoleEnabled) {
      if (level >= LogLevel.ERROR) {
        console.error(line);
      } else if (level === LogLevel.WARN) {
        console.warn(line);
      } else if (level === LogLevel.INFO) {
        console.info(line);
      } else {
        console.debug(line);
      }
    }

    for (const sink of this.sinks) {
      sink.append(line);
    }
  }
}

export const loggerHierarchy = new LoggerHierarchy();

export const logger = loggerHierarchy.getLogger('actuator');
