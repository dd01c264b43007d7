/**
 * Main entry point of the actuator agent
 */

export * from './types';
export * from './agent';
export * from './integration/registry';
export * from './infrastructure/config';
export * from './infrastructure/http';
export * as Monitoring from './infrastructure/monitoring';
export { RingBuffer, DEFAULT_RING_BUFFER_CAPACITY } from './shared/utils/ring-buffer';
export { Logger, LoggerHierarchy, LogLevel, LogSink, logger, loggerHierarchy } from './shared/utils/logger';
export { gracefulShutdown } from './shared/utils/graceful-shutdown';
