import type { Registrable } from '../interfaces/IServiceRegistry.js';

/**
 * Zero-based index of `self` among registry entries of the same service type.
 * Types are compared by identity, so two classes that share a name are not
 * peers.
 * An instance not yet registered gets the next free slot.
 *
 * Example: registering Zookeeper, Kafka, Zookeeper, Kafka, MirrorMaker gives
 * orders 0, 0, 1, 1, 0.
 */
export function resolveOrder(self: Registrable, registry: readonly Registrable[]): number {
  const peers = registry.filter(entry => entry.serviceType === self.serviceType);
  const position = peers.indexOf(self);
  return position === -1 ? peers.length : position;
}
