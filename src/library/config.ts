import ms from 'ms';
import * as x from 'x-value';

import {CASADNS_ENDPOINT_DEFAULT} from './casadns/index.js';
import {IPDiscoveryOptions} from './discovery/index.js';
import {normalizeDomains} from './domains.js';
import {WebOptions} from './web.js';
import {HTTPURL, IntervalMinutes} from './x.js';

export const INTERVAL_MINUTES_DEFAULT = IntervalMinutes.nominalize(15);

export const Config = x.object({
  /**
   * Comma separated labels, e.g.: "home,server" or "home.casadns.eu".
   */
  domains: x.string,
  token: x.string,
  /**
   * Check interval in minutes.
   */
  interval: IntervalMinutes.optional(),
  endpoint: HTTPURL.optional(),
  discovery: IPDiscoveryOptions.optional(),
  /**
   * Status and manual update web surface, disabled if omitted.
   */
  web: WebOptions.optional(),
});

export type Config = x.TypeOf<typeof Config>;

export type ResolvedConfig = {
  domains: string;
  token: string;
  /**
   * Milliseconds.
   */
  interval: number;
  endpoint: string;
  discovery: IPDiscoveryOptions;
  web: WebOptions | undefined;
};

export type ConfigErrorCode = 'invalid_domains' | 'invalid_token';

export class ConfigError extends Error {
  constructor(readonly code: ConfigErrorCode) {
    super(
      code === 'invalid_domains'
        ? 'At least one domain is required.'
        : 'Token is required.',
    );
    this.name = 'ConfigError';
  }
}

const ENVIRONMENT_OVERRIDES = [
  ['CASADNS_DOMAINS', 'domains'],
  ['CASADNS_TOKEN', 'token'],
  ['CASADNS_INTERVAL', 'interval'],
] as const;

/**
 * Overlay `CASADNS_*` environment variables on a raw (not yet validated)
 * config object.
 */
export function applyEnvironmentOverrides(
  raw: unknown,
  env: NodeJS.ProcessEnv,
): unknown {
  const config: Record<string, unknown> =
    typeof raw === 'object' && raw !== null ? {...raw} : {};

  for (const [variable, key] of ENVIRONMENT_OVERRIDES) {
    const value = env[variable];

    if (value === undefined || value === '') {
      continue;
    }

    config[key] = key === 'interval' ? Number(value) : value;
  }

  return config;
}

export function resolveConfig({
  domains: rawDomains,
  token,
  interval = INTERVAL_MINUTES_DEFAULT,
  endpoint = HTTPURL.nominalize(CASADNS_ENDPOINT_DEFAULT),
  discovery = {provider: 'http'},
  web,
}: Config): ResolvedConfig {
  const domains = normalizeDomains(rawDomains);

  if (!domains) {
    throw new ConfigError('invalid_domains');
  }

  if (!token) {
    throw new ConfigError('invalid_token');
  }

  return {
    domains,
    token,
    interval: interval * ms('1m'),
    endpoint,
    discovery,
    web,
  };
}
