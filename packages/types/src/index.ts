// Export all types from the types package
export * from './logger.types';
export * from './permission.types';
export * from './platform.types';
export * from './capability.types';
export * from './bridge.types';
