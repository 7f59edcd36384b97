import type { ClusterNode } from './ICluster.js';

/**
 * Per-node operations a concrete service type provides. The lifecycle
 * controller calls them node by node, in allocation order.
 */
export interface IServiceHooks {
  startNode(node: ClusterNode): Promise<void>;
  stopNode(node: ClusterNode): Promise<void>;
  /** Resolves true if the node finished within the remaining budget. */
  waitNode(node: ClusterNode, remainingSec: number): Promise<boolean>;
  cleanNode(node: ClusterNode): Promise<void>;
}

export interface ILifecycle {
  start(): Promise<void>;
  wait(timeoutSec?: number): Promise<void>;
  stop(): Promise<void>;
}
