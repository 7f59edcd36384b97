import { AllocationError, AlreadyAllocatedError, DirtyNodeError, errorMessage } from '../errors.js';
import type { ClusterNode, ICluster } from '../interfaces/ICluster.js';
import type { ILogger } from '../interfaces/ILogger.js';
import type { IServiceRegistry } from '../interfaces/IServiceRegistry.js';
import type { NodeSpec } from '../types/index.js';

export const BAD_TEST_MESSAGE =
  'This node was handed out while still bound to another service. ' +
  'Check the previous test or service for a missing free() call.';

export interface NodeAllocatorOptions {
  cluster: ICluster;
  logger: ILogger;
  registry: IServiceRegistry;
  /** Label of the owning service, used in diagnostics. */
  owner: () => string;
}

export class NodeAllocator {
  private held: ClusterNode[] = [];
  private readonly cluster: ICluster;
  private readonly logger: ILogger;
  private readonly registry: IServiceRegistry;
  private readonly owner: () => string;

  constructor(options: NodeAllocatorOptions) {
    this.cluster = options.cluster;
    this.logger = options.logger;
    this.registry = options.registry;
    this.owner = options.owner;
  }

  get nodes(): readonly ClusterNode[] {
    return this.held;
  }

  get allocated(): boolean {
    return this.held.length > 0;
  }

  allocate(spec: NodeSpec): readonly ClusterNode[] {
    if (this.allocated) {
      throw new AlreadyAllocatedError(this.owner());
    }

    this.logger.debug(`Requesting nodes from the cluster: ${JSON.stringify(spec)}`);

    let nodes: ClusterNode[];
    try {
      nodes = this.cluster.alloc(spec);
    } catch (error) {
      throw new AllocationError(
        `${errorMessage(error)} Run ${this.registry.runId}, currently registered services: ${this.registry.describe()}`,
        { cause: error }
      );
    }

    const dirty = nodes.filter(node => node.account.logger !== null);
    if (dirty.length > 0) {
      for (const node of dirty) {
        // Report through the occupant so the leaking test's log shows it too
        node.account.logger?.error(BAD_TEST_MESSAGE);
      }
      // Dirty nodes still belong to their previous owner
      for (const node of nodes) {
        if (!dirty.includes(node)) {
          this.cluster.free(node);
        }
      }
      throw new DirtyNodeError(this.owner(), dirty[0].account);
    }

    for (const node of nodes) {
      node.account.logger = this.logger;
    }

    this.held = nodes;
    this.logger.debug(`Successfully allocated ${nodes.length} nodes to ${this.owner()}`);
    return this.held;
  }

  release(): void {
    for (const node of this.held) {
      this.logger.info(`${this.owner()}: freeing node ${node.account.hostname}`);
      node.account.logger = null;
      this.cluster.free(node);
    }
    this.held = [];
  }
}
