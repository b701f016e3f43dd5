export * from './base64.js';
export * from './contracts.js';
export * from './engine.js';
export * from './errors.js';
export * from './localKeyManager.js';
export * from './sealing.js';
