export * from './types';
export * from './constants';
export * from './services';
export * from './event-bus';
