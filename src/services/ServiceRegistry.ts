import { v4 as uuidv4 } from 'uuid';
import { HarnessError } from '../errors.js';
import type { IServiceRegistry, Registrable, Registration } from '../interfaces/IServiceRegistry.js';
import { resolveOrder } from './OrderResolver.js';

let nextInstanceId = 1;

/**
 * Append-only list of every service created during one test run. External
 * tooling walks it to clean up after services when something goes wrong.
 */
export class ServiceRegistry<T extends Registrable = Registrable> implements IServiceRegistry<T> {
  readonly runId: string;
  private readonly entries: T[] = [];

  constructor(runId: string = uuidv4()) {
    this.runId = runId;
  }

  get services(): readonly T[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  /** Assigns the order and instance id once; callers cache the result. */
  register(service: T): Registration {
    if (this.entries.includes(service)) {
      throw new HarnessError(`Service already registered in run ${this.runId}: ${String(service)}`);
    }

    const order = resolveOrder(service, this.entries);
    const instanceId = nextInstanceId++;
    this.entries.push(service);
    return { order, instanceId };
  }

  ofType(serviceType: object): T[] {
    return this.entries.filter(service => service.serviceType === serviceType);
  }

  describe(): string {
    return `[${this.entries.map(service => String(service)).join(', ')}]`;
  }
}
