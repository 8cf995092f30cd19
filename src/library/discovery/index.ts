import * as x from 'x-value';

import type {IHTTPClient} from '../@utils/index.js';

import {HTTPIPDiscovery, HTTPIPDiscoveryOptions} from './http-ip-discovery.js';
import type {IIPDiscovery} from './ip-discovery.js';
import {
  PublicIPDiscovery,
  PublicIPDiscoveryOptions,
} from './public-ip-discovery.js';

export const IPDiscoveryOptions = x.union([
  HTTPIPDiscoveryOptions,
  PublicIPDiscoveryOptions,
]);

export type IPDiscoveryOptions = x.TypeOf<typeof IPDiscoveryOptions>;

export function createIPDiscovery(
  client: IHTTPClient,
  options: IPDiscoveryOptions = {provider: 'http'},
): IIPDiscovery {
  switch (options.provider) {
    case 'http':
      return new HTTPIPDiscovery(client, options);
    case 'public-ip':
      return new PublicIPDiscovery();
  }
}

export * from './ip-discovery.js';
export * from './http-ip-discovery.js';
export * from './public-ip-discovery.js';
