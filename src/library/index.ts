export * from './casadns/index.js';
export * from './config.js';
export * from './discovery/index.js';
export * from './domains.js';
export * from './setup.js';
export * from './updater/index.js';
export * from './web.js';
export * from './x.js';
export type {
  HTTPGetOptions,
  HTTPResponse,
  IHTTPClient,
} from './@utils/index.js';
