import type { ClusterNode, RemoteAccount } from './interfaces/ICluster.js';
import type { NodeSpec } from './types/index.js';

export class HarnessError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid or missing node request. */
export class ConfigurationError extends HarnessError {}

/** The cluster could not satisfy a node request. */
export class AllocationError extends HarnessError {}

export class AlreadyAllocatedError extends HarnessError {
  constructor(readonly serviceId: string) {
    super(`Requesting nodes for a service that has already been allocated nodes: ${serviceId}`);
  }
}

/** A freshly allocated node still carries the logger of a previous owner. */
export class DirtyNodeError extends HarnessError {
  constructor(readonly serviceId: string, readonly account: RemoteAccount) {
    super(
      'logger was not null on service start. There may be a concurrency issue, ' +
      'or some service which isn\'t properly cleaning up after itself. ' +
      `Service: ${serviceId}, node.account: ${String(account)}`
    );
  }
}

export class UnimplementedHookError extends HarnessError {
  constructor(readonly hook: string, readonly serviceId: string) {
    super(`${serviceId}: subclasses must implement ${hook}`);
  }
}

export class TimeoutError extends HarnessError {
  constructor(readonly timeoutSec: number, readonly unfinishedNodes: readonly ClusterNode[]) {
    super(
      `Timed out waiting ${timeoutSec} seconds for service nodes to finish. ` +
      `These nodes are still alive: [${unfinishedNodes.map(node => String(node.account)).join(', ')}]`
    );
  }
}

export class InsufficientResourcesError extends HarnessError {
  constructor(readonly requested: NodeSpec, readonly available: NodeSpec) {
    super(
      `Not enough nodes available to satisfy ${JSON.stringify(requested)}; ` +
      `available: ${JSON.stringify(available)}`
    );
  }
}

/**
 * Errors that point at a bug in the caller rather than at the state of a node.
 */
export function isProgrammingError(error: unknown): boolean {
  return error instanceof UnimplementedHookError ||
    error instanceof TypeError ||
    error instanceof ReferenceError ||
    error instanceof SyntaxError ||
    error instanceof RangeError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
