import type { NodeSpec, OsType } from '../types/index.js';
import type { ILogger } from './ILogger.js';

/**
 * The account on an allocated node. The logger slot is null while the node is
 * unbound; a non-null slot on a freshly allocated node means a previous owner
 * never released it.
 */
export interface RemoteAccount {
  readonly hostname: string;
  readonly user?: string;
  logger: ILogger | null;
  toString(): string;
}

export interface ClusterNode {
  readonly account: RemoteAccount;
  readonly osType: OsType;
}

export interface ICluster {
  /** Returns nodes in allocation order; throws when the request cannot be satisfied. */
  alloc(spec: NodeSpec): ClusterNode[];
  free(node: ClusterNode): void;
}
