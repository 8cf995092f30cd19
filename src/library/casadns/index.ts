export * from './casadns-client.js';
