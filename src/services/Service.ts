import { TimeoutError, UnimplementedHookError, errorMessage, isProgrammingError } from '../errors.js';
import { systemClock } from '../interfaces/IClock.js';
import type { IClock } from '../interfaces/IClock.js';
import type { ClusterNode, ICluster } from '../interfaces/ICluster.js';
import type { ILogger } from '../interfaces/ILogger.js';
import type { ILifecycle, IServiceHooks } from '../interfaces/IServiceHooks.js';
import type { IServiceRegistry, Registrable } from '../interfaces/IServiceRegistry.js';
import type {
  LifecycleTimestamps,
  LogDescriptors,
  NodeRequest,
  NodeSpec,
  ServiceIdentity,
  ServiceSnapshot,
} from '../types/index.js';
import { DEFAULT_WAIT_TIMEOUT_SEC } from '../utils/config.js';
import { serializeService } from '../utils/snapshot.js';
import type { SnapshotSource } from '../utils/snapshot.js';
import { NodeAllocator } from './NodeAllocator.js';
import { resolveNodeSpec } from './NodeSpecResolver.js';
import { ScratchDirManager } from './ScratchDirManager.js';

export interface ServiceDeps {
  cluster: ICluster;
  logger: ILogger;
  registry: IServiceRegistry;
  clock?: IClock;
  /** Parent directory for the service's local scratch directory. */
  scratchRoot?: string;
  defaultWaitTimeoutSec?: number;
}

export interface ServiceOptions extends NodeRequest {
  moduleTag?: string;
}

/**
 * A service deployed onto a set of cluster nodes. Concrete service types
 * extend this class and override the per-node hooks; the base class requests
 * nodes on construction and drives start, wait, stop and clean across them in
 * allocation order.
 *
 * Nodes are allocated before the service registers itself; a service whose
 * allocation fails is never registered.
 */
export class Service implements IServiceHooks, ILifecycle, Registrable, SnapshotSource {
  /**
   * Log files the service writes on its nodes, e.g.
   * `{ zkLog: { path: '/mnt/zk.log', collectDefault: true } }`.
   */
  logs: LogDescriptors = {};

  readonly serviceType: object;
  /** Class name, for display only. */
  readonly typeTag: string;
  readonly moduleTag: string;
  readonly nodeSpec: NodeSpec;
  readonly formerlyAllocatedIds: readonly string[];
  readonly order: number;
  readonly instanceId: number;

  protected readonly logger: ILogger;

  private readonly clock: IClock;
  private readonly allocator: NodeAllocator;
  private readonly scratch: ScratchDirManager;
  private readonly defaultWaitTimeoutSec: number;
  private readonly lifecycle: LifecycleTimestamps;
  private registered = false;

  constructor(deps: ServiceDeps, options: ServiceOptions) {
    this.clock = deps.clock ?? systemClock;
    this.lifecycle = {
      initTime: this.clock.now(),
      startTime: null,
      startDurationSeconds: null,
      stopTime: null,
      stopDurationSeconds: null,
      cleanTime: null,
    };

    this.serviceType = new.target;
    this.typeTag = new.target.name;
    this.moduleTag = options.moduleTag ?? 'services';
    this.logger = deps.logger;
    this.defaultWaitTimeoutSec = deps.defaultWaitTimeoutSec ?? DEFAULT_WAIT_TIMEOUT_SEC;
    this.scratch = new ScratchDirManager(deps.scratchRoot, `${this.typeTag}-`);

    this.nodeSpec = resolveNodeSpec(options);
    this.allocator = new NodeAllocator({
      cluster: deps.cluster,
      logger: deps.logger,
      registry: deps.registry,
      owner: () => (this.registered ? this.serviceId : this.typeTag),
    });
    this.allocator.allocate(this.nodeSpec);

    // String forms only; these outlive free()
    this.formerlyAllocatedIds = this.nodes.map(node => String(node.account));

    const { order, instanceId } = deps.registry.register(this);
    this.order = order;
    this.instanceId = instanceId;
    this.registered = true;
  }

  get identity(): ServiceIdentity {
    return { typeTag: this.typeTag, order: this.order, instanceId: this.instanceId };
  }

  /** Human-readable identifier, unique within a test run. */
  get serviceId(): string {
    return `${this.typeTag}-${this.order}-${this.instanceId}`;
  }

  get nodes(): readonly ClusterNode[] {
    return this.allocator.nodes;
  }

  get allocated(): boolean {
    return this.allocator.allocated;
  }

  get timestamps(): Readonly<LifecycleTimestamps> {
    return { ...this.lifecycle };
  }

  /** Created lazily on the test driver; removed by close(). */
  get localScratchDir(): string {
    return this.scratch.dir();
  }

  whoAmI(node?: ClusterNode): string {
    if (node === undefined) {
      return this.serviceId;
    }
    return `${this.serviceId} node ${this.idx(node)} on ${node.account.hostname}`;
  }

  /** Node indices are 1-based. */
  getNode(idx: number): ClusterNode {
    const node = this.nodes[idx - 1];
    if (!Number.isInteger(idx) || idx < 1 || node === undefined) {
      throw new RangeError(`${this.whoAmI()}: no node with index ${idx}`);
    }
    return node;
  }

  /** 1-based index of the node within this service, or -1 if it is not ours. */
  idx(node: ClusterNode): number {
    const position = this.nodes.indexOf(node);
    return position === -1 ? -1 : position + 1;
  }

  async start(): Promise<void> {
    this.logger.info(`${this.whoAmI()}: starting service`);
    const startTime = this.lifecycle.startTime ?? this.clock.now();
    this.lifecycle.startTime = startTime;

    this.logger.debug(`${this.whoAmI()}: killing processes and attempting to clean up before starting`);
    for (const node of this.nodes) {
      // Either step may fail when there is no process to kill or nothing to remove
      await this.bestEffort(node, 'stopNode', () => this.stopNode(node));
      await this.bestEffort(node, 'cleanNode', () => this.cleanNode(node));
    }

    for (const node of this.nodes) {
      this.logger.debug(`${this.whoAmI(node)}: starting node`);
      await this.startNode(node);
    }

    if (this.lifecycle.startDurationSeconds === null) {
      this.lifecycle.startDurationSeconds = this.clock.now() - startTime;
    }
  }

  /**
   * Wait for every node to finish. The timeout covers the whole call, not
   * each node: nodes reached after the deadline are reported without being
   * waited on.
   */
  async wait(timeoutSec: number = this.defaultWaitTimeoutSec): Promise<void> {
    const unfinished: ClusterNode[] = [];
    const deadline = this.clock.now() + timeoutSec;

    for (const node of this.nodes) {
      const remaining = deadline - this.clock.now();
      if (remaining > 0) {
        this.logger.debug(`${this.whoAmI(node)}: waiting for node`);
        if (!(await this.waitNode(node, remaining))) {
          unfinished.push(node);
        }
      } else {
        unfinished.push(node);
      }
    }

    if (unfinished.length > 0) {
      throw new TimeoutError(timeoutSec, unfinished);
    }
  }

  async stop(): Promise<void> {
    const stopTime = this.clock.now();
    this.lifecycle.stopTime = stopTime;
    this.logger.info(`${this.whoAmI()}: stopping service`);
    for (const node of this.nodes) {
      this.logger.info(`${this.whoAmI(node)}: stopping node`);
      await this.stopNode(node);
    }
    this.lifecycle.stopDurationSeconds = this.clock.now() - stopTime;
  }

  /** Remove persistent state (logs, config files) from every node. */
  async clean(): Promise<void> {
    this.lifecycle.cleanTime = this.clock.now();
    this.logger.info(`${this.whoAmI()}: cleaning service`);
    for (const node of this.nodes) {
      this.logger.info(`${this.whoAmI(node)}: cleaning node`);
      await this.cleanNode(node);
    }
  }

  async run(): Promise<void> {
    await this.start();
    await this.wait();
    await this.stop();
  }

  /** Return the nodes to the cluster. Their identifiers stay in formerlyAllocatedIds. */
  free(): void {
    this.allocator.release();
  }

  close(): void {
    this.scratch.close();
  }

  async startNode(node: ClusterNode): Promise<void> {
    throw new UnimplementedHookError('startNode', this.serviceId);
  }

  async stopNode(node: ClusterNode): Promise<void> {
    throw new UnimplementedHookError('stopNode', this.serviceId);
  }

  async waitNode(node: ClusterNode, remainingSec: number): Promise<boolean> {
    throw new UnimplementedHookError('waitNode', this.serviceId);
  }

  async cleanNode(node: ClusterNode): Promise<void> {
    this.logger.warn(
      `${this.whoAmI(node)}: cleanNode has not been overridden. ` +
      'This may be fine if the service leaves no persistent state.'
    );
  }

  toJSON(): ServiceSnapshot {
    return serializeService(this);
  }

  toString(): string {
    const hosts = this.nodes.map(node => node.account.hostname).join(', ');
    return `<${this.serviceId}: num_nodes: ${this.nodes.length}, nodes: [${hosts}]>`;
  }

  private async bestEffort(node: ClusterNode, hook: string, step: () => Promise<void>): Promise<void> {
    try {
      await step();
    } catch (error) {
      if (isProgrammingError(error)) {
        throw error;
      }
      this.logger.debug(`${this.whoAmI(node)}: ignoring ${hook} failure before start: ${errorMessage(error)}`);
    }
  }
}
