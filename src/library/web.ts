import {once} from 'events';
import type * as HTTP from 'http';

import Express from 'express';
import * as x from 'x-value';

import {Logs, WEB_LISTENING_ON} from './@log/index.js';
import type {Updater, UpdaterState} from './updater/index.js';
import {IPPattern, ListeningHost, Port} from './x.js';

export const WEB_HOST_DEFAULT = IPPattern.nominalize('127.0.0.1');
export const WEB_PORT_DEFAULT = Port.nominalize(8080);

export const WebOptions = x.object({
  host: ListeningHost.optional(),
  port: Port.optional(),
});

export type WebOptions = x.TypeOf<typeof WebOptions>;

export type UpdaterStateJSON = {
  publicIP: string | null;
  ipv4: string | null;
  ipv6: string | null;
  lastStatus: number | null;
  lastError: string | null;
  lastUpdated: string | null;
};

export function serializeUpdaterState({
  publicIP,
  ipv4,
  ipv6,
  lastStatus,
  lastError,
  lastUpdated,
}: UpdaterState): UpdaterStateJSON {
  return {
    publicIP: publicIP ?? null,
    ipv4: ipv4 ?? null,
    ipv6: ipv6 ?? null,
    lastStatus: lastStatus ?? null,
    lastError: lastError ?? null,
    lastUpdated: lastUpdated?.toISOString() ?? null,
  };
}

/**
 * Exposes updater state (`GET /status`) and a manual forced update
 * (`POST /update`).
 */
export class Web {
  readonly app: Express.Express;

  constructor(updater: Updater) {
    const app = Express();

    app.use((request, _response, next) => {
      Logs.info('web', request.method, request.url);

      next();
    });

    app.get('/status', (_request, response) => {
      response.json(serializeUpdaterState(updater.getState()));
    });

    app.post('/update', (_request, response, next) => {
      void updater
        .update(true)
        .then(
          () => response.json(serializeUpdaterState(updater.getState())),
          next,
        );
    });

    app.use((_request, response) => {
      response.status(404).json({error: 'not found'});
    });

    this.app = app;
  }

  async listen({
    host = WEB_HOST_DEFAULT,
    port = WEB_PORT_DEFAULT,
  }: WebOptions = {}): Promise<HTTP.Server> {
    const server = this.app.listen(port, host);

    await once(server, 'listening');

    Logs.info('web', WEB_LISTENING_ON(host, port));

    return server;
  }
}
