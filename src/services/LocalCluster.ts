import { HarnessError, InsufficientResourcesError } from '../errors.js';
import type { ClusterNode, ICluster, RemoteAccount } from '../interfaces/ICluster.js';
import type { ILogger } from '../interfaces/ILogger.js';
import { SUPPORTED_OS_TYPES } from '../types/index.js';
import type { NodeSpec, OsType } from '../types/index.js';

export class LocalAccount implements RemoteAccount {
  logger: ILogger | null = null;

  constructor(readonly hostname: string, readonly user?: string) {}

  toString(): string {
    return this.user ? `${this.user}@${this.hostname}` : this.hostname;
  }
}

export class LocalNode implements ClusterNode {
  constructor(readonly account: LocalAccount, readonly osType: OsType) {}
}

export interface LocalClusterOptions {
  capacity: NodeSpec;
  hostnamePrefix?: string;
  user?: string;
}

/**
 * In-process cluster backed by a fixed pool of named nodes. Requests are
 * all-or-nothing and hand out the lowest-numbered free nodes of each OS.
 */
export class LocalCluster implements ICluster {
  private readonly pool: LocalNode[] = [];
  private readonly inUse = new Set<LocalNode>();

  constructor(options: LocalClusterOptions) {
    const prefix = options.hostnamePrefix ?? 'worker';
    for (const os of SUPPORTED_OS_TYPES) {
      const count = options.capacity[os] ?? 0;
      for (let i = 1; i <= count; i++) {
        const hostname = os === 'linux' ? `${prefix}${i}` : `${prefix}-${os}${i}`;
        this.pool.push(new LocalNode(new LocalAccount(hostname, options.user), os));
      }
    }
  }

  alloc(spec: NodeSpec): ClusterNode[] {
    const picked: LocalNode[] = [];

    for (const [os, count] of Object.entries(spec)) {
      const free = this.pool.filter(node => node.osType === os && !this.inUse.has(node));
      if (count === undefined || free.length < count) {
        throw new InsufficientResourcesError(spec, this.available());
      }
      picked.push(...free.slice(0, count));
    }

    for (const node of picked) {
      this.inUse.add(node);
    }
    return picked;
  }

  free(node: ClusterNode): void {
    const local = this.pool.find(candidate => candidate === node);
    if (!local || !this.inUse.has(local)) {
      throw new HarnessError(`Node is not allocated from this cluster: ${String(node.account)}`);
    }
    this.inUse.delete(local);
  }

  availableCount(os?: OsType): number {
    return this.pool.filter(node => !this.inUse.has(node) && (os === undefined || node.osType === os)).length;
  }

  inUseCount(): number {
    return this.inUse.size;
  }

  private available(): NodeSpec {
    const available: NodeSpec = {};
    for (const os of SUPPORTED_OS_TYPES) {
      const count = this.availableCount(os);
      if (count > 0) {
        available[os] = count;
      }
    }
    return available;
  }
}
