export * from './actuator-router';
export * from './trace-middleware';
