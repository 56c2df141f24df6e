/**
 * Type definitions barrel export
 */

export * from './result';
export * from './connection';
export * from './settings';
