import { ConfigurationError } from '../errors.js';
import { DEFAULT_OS_TYPE, SUPPORTED_OS_TYPES } from '../types/index.js';
import type { NodeRequest, NodeSpec, OsType } from '../types/index.js';

function isSupportedOs(value: string): value is OsType {
  return SUPPORTED_OS_TYPES.some(os => os === value);
}

function assertPositiveCount(os: string, count: number): void {
  if (!Number.isInteger(count) || count <= 0) {
    throw new ConfigurationError(`Node count for '${os}' must be a positive integer, got ${count}`);
  }
}

/**
 * Turns a node count or an explicit OS -> count mapping into a validated node spec.
 * A mapping wins over a count; a bare count means that many default-OS nodes.
 */
export function resolveNodeSpec(request: NodeRequest): NodeSpec {
  const { numNodes, nodeSpec } = request;

  if (!numNodes && !nodeSpec) {
    throw new ConfigurationError('Either numNodes or nodeSpec must be provided.');
  }

  if (!nodeSpec) {
    // numNodes is truthy here
    const count = numNodes ?? 0;
    assertPositiveCount(DEFAULT_OS_TYPE, count);
    return { [DEFAULT_OS_TYPE]: count };
  }

  const entries = Object.entries(nodeSpec);
  if (entries.length === 0) {
    throw new ConfigurationError('nodeSpec must request at least one operating system.');
  }

  const resolved: NodeSpec = {};
  for (const [os, count] of entries) {
    if (!isSupportedOs(os)) {
      throw new ConfigurationError(
        `Each nodeSpec key must be a supported operating system: ${SUPPORTED_OS_TYPES.join(', ')}. ` +
        `'${os}' is unknown. nodeSpec: ${JSON.stringify(nodeSpec)}`
      );
    }
    assertPositiveCount(os, count);
    resolved[os] = count;
  }

  return resolved;
}

export function totalNodeCount(spec: NodeSpec): number {
  return Object.values(spec).reduce((sum, count) => sum + (count ?? 0), 0);
}
