/**
 * Monitoring components owned by the agent engine
 */

export * from './environment';
export * from './health';
export * from './log-capture';
export * from './logger-registry';
export * from './metrics';
export * from './threads';
export * from './trace-recorder';
