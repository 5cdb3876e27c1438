/**
 * Types barrel export
 */

export * from './result';
export * from './connection';
export * from './inventory';
export * from './settings';
