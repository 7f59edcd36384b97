import type { ILifecycle } from '../interfaces/IServiceHooks.js';

/**
 * Run several services side by side, e.g. a producer and a consumer. Each
 * phase visits the services one at a time in the order given: every service
 * starts before any is waited on, and every wait returns before any service is
 * stopped. The first failure propagates at once; services after it in that
 * phase, and every later phase, are not run.
 */
export async function runParallel(...services: ILifecycle[]): Promise<void> {
  for (const service of services) {
    await service.start();
  }
  for (const service of services) {
    await service.wait();
  }
  for (const service of services) {
    await service.stop();
  }
}
