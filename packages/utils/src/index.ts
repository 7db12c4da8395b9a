export * from './logger';
export * from './errors';
export * from './type_guards';
export * from './config';
