/**
 * Schema validation exports
 */

export * from './config.schema';
export * from './validation';
