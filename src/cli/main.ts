#!/usr/bin/env node

import {cosmiconfig} from 'cosmiconfig';

import {
  CLI_ERROR_LOADING_CONFIG,
  CLI_MANUAL_UPDATE,
  CLI_SHUTTING_DOWN,
  Logs,
} from '../library/@log/index.js';
import type {ResolvedConfig} from '../library/index.js';
import {
  Config,
  applyEnvironmentOverrides,
  resolveConfig,
  setup,
} from '../library/index.js';

const config = await loadConfig(process.argv[2] as string | undefined).catch(
  (error: unknown) => {
    Logs.error('cli', CLI_ERROR_LOADING_CONFIG(error));
    process.exit(1);
  },
);

const {updater, close} = await setup(config);

process.on('SIGUSR1', () => {
  Logs.info('cli', CLI_MANUAL_UPDATE);
  void updater.update(true);
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    Logs.info('cli', CLI_SHUTTING_DOWN(signal));

    void close().then(
      () => process.exit(0),
      (error: unknown) => {
        Logs.error('cli', error);
        process.exit(1);
      },
    );
  });
}

async function loadConfig(path: string | undefined): Promise<ResolvedConfig> {
  const configExplorer = cosmiconfig('casadns');

  const result =
    path === undefined
      ? await configExplorer.search()
      : await configExplorer.load(path);

  if (!result) {
    throw new Error('Config file not found.');
  }

  return resolveConfig(
    Config.exact().satisfies(
      applyEnvironmentOverrides(result.config, process.env),
    ),
  );
}
