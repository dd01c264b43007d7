/**
 * Type definitions exports
 */

export * from './common.types';
export * from './actuator.types';
