export * from './scheduler.js';
export * from './updater.js';
