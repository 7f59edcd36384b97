import type { IClock } from './interfaces/IClock.js';
import type { ICluster } from './interfaces/ICluster.js';
import { ServiceRegistry } from './services/ServiceRegistry.js';
import type { ServiceDeps } from './services/Service.js';
import type { HarnessConfig } from './types/index.js';
import { HarnessLogger } from './utils/logger.js';

export interface Harness extends ServiceDeps {
  logger: HarnessLogger;
  registry: ServiceRegistry;
  config: HarnessConfig;
}

/** Wire the logger, registry and cluster a test run hands to its services. */
export function createHarness(cluster: ICluster, config: HarnessConfig, clock?: IClock): Harness {
  const logger = new HarnessLogger({
    logLevel: config.logLevel,
    logToFile: config.logFile !== undefined,
    logFilePath: config.logFile,
    enableConsole: config.logToConsole,
  });
  const registry = new ServiceRegistry();
  logger.info(`Harness run ${registry.runId} initialized`);

  return {
    cluster,
    logger,
    registry,
    clock,
    config,
    scratchRoot: config.scratchRoot,
    defaultWaitTimeoutSec: config.waitTimeoutSec,
  };
}
