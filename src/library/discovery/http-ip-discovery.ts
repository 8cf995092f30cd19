import * as x from 'x-value';

import {
  DISCOVERY_ERROR,
  DISCOVERY_HTTP_STATUS,
  DISCOVERY_INVALID_IP,
  DISCOVERY_RESULT,
  Logs,
} from '../@log/index.js';
import type {IHTTPClient} from '../@utils/index.js';
import {HTTPURL, getIPFamily} from '../x.js';

import type {DiscoveredIPs, IIPDiscovery, IPFamily} from './ip-discovery.js';
import {DISCOVERY_TIMEOUT} from './ip-discovery.js';

const IPV4_ENDPOINT_DEFAULT = HTTPURL.nominalize('https://ipv4.api.ipify.org');
const IPV6_ENDPOINT_DEFAULT = HTTPURL.nominalize('https://ipv6.api.ipify.org');

export const HTTPIPDiscoveryOptions = x.object({
  provider: x.literal('http'),
  /**
   * Endpoint reachable over IPv4 only, responding the address as plain text.
   */
  ipv4: HTTPURL.optional(),
  /**
   * Endpoint reachable over IPv6 only, responding the address as plain text.
   */
  ipv6: HTTPURL.optional(),
});

export type HTTPIPDiscoveryOptions = x.TypeOf<typeof HTTPIPDiscoveryOptions>;

export class HTTPIPDiscovery implements IIPDiscovery {
  readonly name = 'http';

  private ipv4Endpoint: string;
  private ipv6Endpoint: string;

  constructor(
    private client: IHTTPClient,
    {
      ipv4: ipv4Endpoint = IPV4_ENDPOINT_DEFAULT,
      ipv6: ipv6Endpoint = IPV6_ENDPOINT_DEFAULT,
    }: Partial<HTTPIPDiscoveryOptions> = {},
  ) {
    this.ipv4Endpoint = ipv4Endpoint;
    this.ipv6Endpoint = ipv6Endpoint;
  }

  async discover(): Promise<DiscoveredIPs> {
    const [ipv4, ipv6] = await Promise.all([
      this.get('IPv4', this.ipv4Endpoint),
      this.get('IPv6', this.ipv6Endpoint),
    ]);

    Logs.debug('discovery', DISCOVERY_RESULT(ipv4, ipv6));

    return {ipv4, ipv6};
  }

  private async get(
    family: IPFamily,
    endpoint: string,
  ): Promise<string | undefined> {
    const response = await this.client
      .get(endpoint, {timeout: DISCOVERY_TIMEOUT})
      .catch((error: unknown) => {
        Logs.warn('discovery', DISCOVERY_ERROR(family, error));
        Logs.debug('discovery', error);
        return undefined;
      });

    if (!response) {
      return undefined;
    }

    const {status, text} = response;

    if (status !== 200) {
      Logs.warn('discovery', DISCOVERY_HTTP_STATUS(family, status));
      return undefined;
    }

    const ip = text.trim();

    if (getIPFamily(ip) !== family) {
      Logs.warn('discovery', DISCOVERY_INVALID_IP(family, ip));
      return undefined;
    }

    return ip;
  }
}
