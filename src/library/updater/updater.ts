import ms from 'ms';

import {
  Logs,
  UPDATER_ERROR_IN_LISTENER,
  UPDATER_ERROR_UPDATING,
  UPDATER_NO_PUBLIC_IP,
  UPDATER_PUBLIC_IPS_CHANGED,
  UPDATER_PUBLIC_IPS_UNCHANGED,
  UPDATER_STARTED,
  UPDATER_STOPPED,
} from '../@log/index.js';
import type {ICasaDNSClient} from '../casadns/index.js';
import type {IIPDiscovery} from '../discovery/index.js';

import type {CancelSchedule, Scheduler} from './scheduler.js';
import {scheduleInterval} from './scheduler.js';

export const UPDATE_INTERVAL_DEFAULT = ms('15m');

export type UpdaterListener = () => void;

export type UpdaterOptions = {
  domains: string;
  token: string;
  /**
   * Milliseconds between periodic checks, defaults to 15 minutes.
   */
  interval?: number;
  discovery: IIPDiscovery;
  client: ICasaDNSClient;
  scheduler?: Scheduler;
  now?: () => Date;
};

export type UpdaterState = {
  /**
   * IPv4 if available, otherwise IPv6.
   */
  publicIP: string | undefined;
  ipv4: string | undefined;
  ipv6: string | undefined;
  lastStatus: number | undefined;
  lastError: string | undefined;
  lastUpdated: Date | undefined;
};

export class Updater {
  readonly domains: string;
  readonly interval: number;

  private token: string;

  private discovery: IIPDiscovery;
  private client: ICasaDNSClient;
  private scheduler: Scheduler;
  private now: () => Date;

  private cancelSchedule: CancelSchedule | undefined;

  private listeners: UpdaterListener[] = [];

  /**
   * Tail of the update queue, cycles run one after another.
   */
  private updatePromise: Promise<void> = Promise.resolve();

  private _lastIP: string | undefined;
  private _lastIPv4: string | undefined;
  private _lastIPv6: string | undefined;

  private _lastStatus: number | undefined;
  private _lastError: string | undefined;
  private _lastUpdated: Date | undefined;

  constructor({
    domains,
    token,
    interval = UPDATE_INTERVAL_DEFAULT,
    discovery,
    client,
    scheduler = scheduleInterval,
    now = () => new Date(),
  }: UpdaterOptions) {
    this.domains = domains;
    this.token = token;
    this.interval = interval;

    this.discovery = discovery;
    this.client = client;
    this.scheduler = scheduler;
    this.now = now;
  }

  get lastIP(): string | undefined {
    return this._lastIP;
  }

  get lastIPv4(): string | undefined {
    return this._lastIPv4;
  }

  get lastIPv6(): string | undefined {
    return this._lastIPv6;
  }

  /**
   * HTTP status of the last update call that got a response.
   */
  get lastStatus(): number | undefined {
    return this._lastStatus;
  }

  /**
   * Message of the last transport failure, cleared by the next response.
   */
  get lastError(): string | undefined {
    return this._lastError;
  }

  /**
   * Time of the last update call that got a response, whatever the status.
   */
  get lastUpdated(): Date | undefined {
    return this._lastUpdated;
  }

  getState(): UpdaterState {
    return {
      publicIP: this._lastIP,
      ipv4: this._lastIPv4,
      ipv6: this._lastIPv6,
      lastStatus: this._lastStatus,
      lastError: this._lastError,
      lastUpdated: this._lastUpdated,
    };
  }

  registerListener(listener: UpdaterListener): void {
    this.listeners.push(listener);
  }

  async start(): Promise<void> {
    this.cancelSchedule = this.scheduler(
      () => void this.update(false),
      this.interval,
    );

    Logs.info('updater', UPDATER_STARTED(this.domains, this.interval));

    await this.update(true);
  }

  stop(): void {
    if (this.cancelSchedule) {
      this.cancelSchedule();
      this.cancelSchedule = undefined;

      Logs.info('updater', UPDATER_STOPPED);
    }
  }

  /**
   * Check public addresses and push them if they changed (or if `force` is
   * true). Resolves after the cycle completes, never rejects.
   */
  update(force = false): Promise<void> {
    const promise = this.updatePromise
      .then(() => this._update(force))
      .catch((error: unknown) => {
        Logs.error('updater', UPDATER_ERROR_UPDATING(error));
        Logs.debug('updater', error);
      });

    this.updatePromise = promise;

    return promise;
  }

  private async _update(force: boolean): Promise<void> {
    const {ipv4, ipv6} = await this.discovery.discover();

    if (ipv4 === undefined && ipv6 === undefined) {
      Logs.warn('updater', UPDATER_NO_PUBLIC_IP);
      return;
    }

    if (!force && ipv4 === this._lastIPv4 && ipv6 === this._lastIPv6) {
      Logs.debug('updater', UPDATER_PUBLIC_IPS_UNCHANGED(ipv4, ipv6));
      return;
    }

    Logs.info(
      'updater',
      UPDATER_PUBLIC_IPS_CHANGED(this._lastIPv4, this._lastIPv6, ipv4, ipv6),
    );

    this._lastIPv4 = ipv4;
    this._lastIPv6 = ipv6;
    this._lastIP = ipv4 ?? ipv6;

    for (const listener of [...this.listeners]) {
      try {
        listener();
      } catch (error) {
        Logs.error('updater', UPDATER_ERROR_IN_LISTENER(error));
        Logs.debug('updater', error);
      }
    }

    const outcome = await this.client.push({
      domains: this.domains,
      token: this.token,
      ipv4,
      ipv6,
    });

    switch (outcome.type) {
      case 'response':
        this._lastStatus = outcome.status;
        this._lastUpdated = this.now();
        this._lastError = undefined;
        break;
      case 'error':
        this._lastError = outcome.error;
        break;
    }
  }
}
