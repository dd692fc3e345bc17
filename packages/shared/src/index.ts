/**
 * @lanecoach/shared
 * Types, wire schemas, constants and utilities shared by the services
 */

export * from './types';
export * from './schemas';
export * from './constants';
export * from './utils';
