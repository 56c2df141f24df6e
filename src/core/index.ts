/**
 * Core barrel export
 */

export * from './ipv4';
export * from './resolver';
export * from './command-builder';
