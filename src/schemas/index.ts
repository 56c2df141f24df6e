/**
 * Schema validation exports
 */

export * from './settings.schema';
export * from './validation';
