export * from './contracts.js';
export * from './errors.js';
export * from './keyedLock.js';
export * from './keyService.js';
export * from './keystoreService.js';
export * from './repository.js';
