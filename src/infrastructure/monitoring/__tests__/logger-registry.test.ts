/**
 * Unit tests for LoggerRegistry
 */

import { LoggerHierarchy, LogLevel } from '../../../shared/utils/logger';
import { LoggerRegistry } from '../logger-registry';
import { InvalidArgumentError, LoggerNotFoundError } from '../../../types';

describe('LoggerRegistry', () => {
  let hierarchy: LoggerHierarchy;
  let registry: LoggerRegistry;

  beforeEach(() => {
    hierarchy = new LoggerHierarchy();
    hierarchy.setConsoleEnabled(false);
    registry = new LoggerRegistry(hierarchy);
  });

  it('should list levels and known loggers', () => {
    hierarchy.getLogger('app.http');

    expect(registry.getLoggers()).toEqual({
      levels: ['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL', 'OFF'],
      loggers: {
        ROOT: { configuredLevel: 'INFO', effectiveLevel: 'INFO' },
        'app.http': { configuredLevel: null, effectiveLevel: 'INFO' }
      }
    });
  });

  it('should set and read back a configured level', () => {
    registry.setLoggerLevel('x', 'DEBUG');

    expect(registry.getLogger('x')).toEqual({ configuredLevel: 'DEBUG', effectiveLevel: 'DEBUG' });
  });

  it('should clear a configured level back to inherited', () => {
    registry.setLoggerLevel('x', 'DEBUG');
    registry.setLoggerLevel('x', null);

    expect(registry.getLogger('x')).toEqual({ configuredLevel: null, effectiveLevel: 'INFO' });
  });

  it('should change effective levels of descendants immediately', () => {
    const child = hierarchy.getLogger('app.db');
    registry.setLoggerLevel('app', 'error');

    expect(registry.getLogger('app.db').effectiveLevel).toBe('ERROR');
    expect(child.isEnabled(LogLevel.INFO)).toBe(false);
  });

  it('should fail for unknown loggers', () => {
    expect(() => registry.getLogger('never.created')).toThrow(LoggerNotFoundError);
  });

  it('should reject unknown level names', () => {
    expect(() => registry.setLoggerLevel('app', 'LOUD')).toThrow(InvalidArgumentError);
  });
});
