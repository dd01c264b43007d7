export * from './config-manager';
