/**
 * Path module - path string formatting
 */

export * from './config.js';
export * from './format.js';
