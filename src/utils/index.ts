export * from './app-registry.js';
export * from './concurrency.js';
export * from './config.js';
export * from './errors.js';
export * from './fs.js';
export * from './history.js';
export * from './path-validator.js';
export * from './permissions.js';
export * from './progress.js';
export * from './size.js';
export * from './trash.js';
