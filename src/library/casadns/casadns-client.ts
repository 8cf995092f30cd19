import {readFileSync} from 'fs';

import * as x from 'x-value';

import {
  CASADNS_ERROR_CALLING,
  CASADNS_UPDATE_FAILED,
  CASADNS_UPDATE_OK,
  Logs,
} from '../@log/index.js';
import type {IHTTPClient} from '../@utils/index.js';
import {getErrorMessage} from '../@utils/index.js';

export const CASADNS_ENDPOINT_DEFAULT = 'https://casadns.eu/update';

const PackageJSON = x.object({
  name: x.string,
  version: x.string,
});

const {name: PACKAGE_NAME, version: PACKAGE_VERSION} = PackageJSON.satisfies(
  JSON.parse(
    readFileSync(new URL('../../../package.json', import.meta.url), 'utf8'),
  ),
);

export const CASADNS_USER_AGENT = `${PACKAGE_NAME}/${PACKAGE_VERSION}`;

const PUSH_TIMEOUT = 10_000;

export type PushRequest = {
  /**
   * Normalized, comma separated labels.
   */
  domains: string;
  token: string;
  ipv4: string | undefined;
  ipv6: string | undefined;
};

export type PushOutcome =
  | {
      type: 'response';
      status: number;
      text: string;
    }
  | {
      type: 'error';
      error: string;
    };

export type ICasaDNSClient = {
  push(request: PushRequest): Promise<PushOutcome>;
};

/**
 * Build the update URL. Existing records are always cleared, `ip` carries
 * IPv4 if available (otherwise IPv6) and `ipv6` is added whenever IPv6 is
 * available.
 */
export function buildUpdateURL(
  endpoint: string,
  {domains, token, ipv4, ipv6}: PushRequest,
): URL {
  const url = new URL(endpoint);

  const params = url.searchParams;

  params.set('domains', domains);
  params.set('token', token);
  params.set('clear', 'true');

  const ip = ipv4 ?? ipv6;

  if (ip !== undefined) {
    params.set('ip', ip);
  }

  if (ipv6 !== undefined) {
    params.set('ipv6', ipv6);
  }

  return url;
}

export class CasaDNSClient implements ICasaDNSClient {
  constructor(
    private client: IHTTPClient,
    readonly endpoint = CASADNS_ENDPOINT_DEFAULT,
  ) {}

  async push(request: PushRequest): Promise<PushOutcome> {
    try {
      const url = buildUpdateURL(this.endpoint, request);

      const {status, text} = await this.client.get(url, {
        headers: {
          'Content-Type': 'text/html',
          'User-Agent': CASADNS_USER_AGENT,
        },
        timeout: PUSH_TIMEOUT,
      });

      if (status === 200) {
        Logs.debug('casadns', CASADNS_UPDATE_OK(text));
      } else {
        Logs.error('casadns', CASADNS_UPDATE_FAILED(status, text));
      }

      return {type: 'response', status, text};
    } catch (error) {
      Logs.error('casadns', CASADNS_ERROR_CALLING(error));
      Logs.debug('casadns', error);

      return {type: 'error', error: getErrorMessage(error)};
    }
  }
}
