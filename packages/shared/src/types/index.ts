export * from './snapshot';
export * from './api';
