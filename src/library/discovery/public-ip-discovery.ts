import {publicIpv4, publicIpv6} from 'public-ip';
import * as x from 'x-value';

import {DISCOVERY_ERROR, DISCOVERY_RESULT, Logs} from '../@log/index.js';

import type {DiscoveredIPs, IIPDiscovery, IPFamily} from './ip-discovery.js';
import {DISCOVERY_TIMEOUT} from './ip-discovery.js';

export const PublicIPDiscoveryOptions = x.object({
  provider: x.literal('public-ip'),
});

export type PublicIPDiscoveryOptions = x.TypeOf<
  typeof PublicIPDiscoveryOptions
>;

/**
 * Discovery through the `public-ip` package, restricted to its HTTPS
 * resolvers.
 */
export class PublicIPDiscovery implements IIPDiscovery {
  readonly name = 'public-ip';

  async discover(): Promise<DiscoveredIPs> {
    const [ipv4, ipv6] = await Promise.all([
      this.get('IPv4', publicIpv4),
      this.get('IPv6', publicIpv6),
    ]);

    Logs.debug('discovery', DISCOVERY_RESULT(ipv4, ipv6));

    return {ipv4, ipv6};
  }

  private async get(
    family: IPFamily,
    resolve: typeof publicIpv4,
  ): Promise<string | undefined> {
    try {
      return await resolve({onlyHttps: true, timeout: DISCOVERY_TIMEOUT});
    } catch (error) {
      Logs.warn('discovery', DISCOVERY_ERROR(family, error));
      Logs.debug('discovery', error);
      return undefined;
    }
  }
}
