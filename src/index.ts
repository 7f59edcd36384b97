export { Service } from './services/Service.js';
export type { ServiceDeps, ServiceOptions } from './services/Service.js';
export { NodeAllocator, BAD_TEST_MESSAGE } from './services/NodeAllocator.js';
export { resolveNodeSpec, totalNodeCount } from './services/NodeSpecResolver.js';
export { resolveOrder } from './services/OrderResolver.js';
export { ServiceRegistry } from './services/ServiceRegistry.js';
export { ScratchDirManager } from './services/ScratchDirManager.js';
export { runParallel } from './services/ParallelRunner.js';
export { LocalCluster, LocalAccount, LocalNode } from './services/LocalCluster.js';
export type { LocalClusterOptions } from './services/LocalCluster.js';

export { createHarness } from './harness.js';
export type { Harness } from './harness.js';

export * from './errors.js';
export * from './types/index.js';

export type { ILogger } from './interfaces/ILogger.js';
export type { ClusterNode, ICluster, RemoteAccount } from './interfaces/ICluster.js';
export type { IClock } from './interfaces/IClock.js';
export { systemClock } from './interfaces/IClock.js';
export type { ILifecycle, IServiceHooks } from './interfaces/IServiceHooks.js';
export type { IServiceRegistry, Registrable, Registration } from './interfaces/IServiceRegistry.js';

export { HarnessLogger, initializeLogger, getLogger, closeLogger } from './utils/logger.js';
export type { LoggerConfig } from './utils/logger.js';
export { loadHarnessConfig, validateHarnessConfig, DEFAULT_WAIT_TIMEOUT_SEC } from './utils/config.js';
export { serializeService } from './utils/snapshot.js';
