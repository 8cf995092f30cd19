import type * as HTTP from 'http';

import type {IHTTPClient} from './@utils/index.js';
import {NodeHTTPClient} from './@utils/index.js';
import {CasaDNSClient} from './casadns/index.js';
import type {ResolvedConfig} from './config.js';
import {createIPDiscovery} from './discovery/index.js';
import type {Scheduler} from './updater/index.js';
import {Updater} from './updater/index.js';
import {Web} from './web.js';

export type SetupOptions = {
  httpClient?: IHTTPClient;
  scheduler?: Scheduler;
};

export type Setup = {
  updater: Updater;
  server: HTTP.Server | undefined;
  close(): Promise<void>;
};

/**
 * Wire up the updater (and the web surface if configured), then start
 * updating. Resolves after the initial forced update.
 */
export async function setup(
  {
    domains,
    token,
    interval,
    endpoint,
    discovery,
    web: webOptions,
  }: ResolvedConfig,
  {httpClient, scheduler}: SetupOptions = {},
): Promise<Setup> {
  let ownedHTTPClient: NodeHTTPClient | undefined;

  if (!httpClient) {
    httpClient = ownedHTTPClient = new NodeHTTPClient();
  }

  const updater = new Updater({
    domains,
    token,
    interval,
    discovery: createIPDiscovery(httpClient, discovery),
    client: new CasaDNSClient(httpClient, endpoint),
    scheduler,
  });

  const server = webOptions
    ? await new Web(updater).listen(webOptions)
    : undefined;

  await updater.start();

  return {
    updater,
    server,
    async close() {
      updater.stop();

      if (server) {
        await new Promise<void>((resolve, reject) =>
          server.close(error => (error ? reject(error) : resolve())),
        );
      }

      ownedHTTPClient?.destroy();
    },
  };
}
