/**
 * Read/write view of the logger hierarchy's levels
 */

import { levelName, LoggerHierarchy, parseLevel } from '../../shared/utils/logger';
import {
  InvalidArgumentError,
  LEVEL_NAMES,
  LoggerConfig,
  LoggerNotFoundError,
  LoggersSnapshot
} from '../../types';

export class LoggerRegistry {
  constructor(private readonly hierarchy: LoggerHierarchy) {}

  getLoggers(): LoggersSnapshot {
    const loggers: Record<string, LoggerConfig> = {};
    for (const name of this.hierarchy.names()) {
      loggers[name] = this.describe(name);
    }
    return { levels: [...LEVEL_NAMES], loggers };
  }

  getLogger(name: string): LoggerConfig {
    if (!this.hierarchy.has(name)) {
      throw new LoggerNotFoundError(name);
    }
    return this.describe(name);
  }

  /**
   * `null` clears the configured level so the logger inherits again.
   */
  setLoggerLevel(name: string, level: string | null): void {
    if (level === null) {
      this.hierarchy.setLevel(name, undefined);
      return;
    }

    const parsed = parseLevel(level);
    if (parsed === undefined) {
      throw new InvalidArgumentError(`Unknown log level: ${level}`, { level, logger: name });
    }
    this.hierarchy.setLevel(name, parsed);
  }

  private describe(name: string): LoggerConfig {
    const configured = this.hierarchy.getConfiguredLevel(name);
    return {
      configuredLevel: configured === undefined ? null : levelName(configured),
      effectiveLevel: levelName(this.hierarchy.getEffectiveLevel(name))
    };
  }
}
