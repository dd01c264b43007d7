export * from './agent-engine';
