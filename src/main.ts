#!/usr/bin/env node
/**
 * Operator entry point: reads configuration from the environment, connects to
 * the cluster and runs the manager until SIGINT or SIGTERM.
 */

import { loadOperatorConfig } from './core/config/index.js';
import { ensureError } from './core/errors.js';
import { KubernetesClientProvider } from './core/kubernetes/index.js';
import { getComponentLogger } from './core/logging/index.js';
import { Manager } from './runtime/manager.js';

const logger = getComponentLogger('main');

async function main(): Promise<void> {
  const config = loadOperatorConfig();
  const provider = KubernetesClientProvider.fromConfig();

  const manager = new Manager({
    cluster: provider.createClusterClient(),
    watchFactory: () => provider.createWatch(),
    logger: getComponentLogger('manager'),
    maxConcurrentReconciles: config.maxConcurrentReconciles,
    resyncPeriodMs: config.resyncPeriodSeconds * 1000,
    ...(config.watchNamespace && { watchNamespace: config.watchNamespace }),
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info('Received signal, shutting down', { signal });
    manager.stop().catch((error: unknown) => {
      logger.error('Shutdown failed', ensureError(error));
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await manager.start();
}

main().catch((error: unknown) => {
  logger.fatal('Operator failed', ensureError(error));
  process.exitCode = 1;
});
