/**
 * Case module - tokenizer, renderer and conversion helpers
 */

export * from './style.js';
export * from './tokenizer.js';
export * from './renderer.js';
export * from './converter.js';
