export type IPFamily = 'IPv4' | 'IPv6';

export type DiscoveredIPs = {
  ipv4: string | undefined;
  ipv6: string | undefined;
};

export type IIPDiscovery = {
  readonly name: string;

  /**
   * Discover current public addresses. Never rejects, a family that could
   * not be determined is `undefined`.
   */
  discover(): Promise<DiscoveredIPs>;
};

export const DISCOVERY_TIMEOUT = 10_000;
