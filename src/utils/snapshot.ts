import type { LifecycleTimestamps, ServiceSnapshot } from '../types/index.js';

export interface SnapshotSource {
  readonly typeTag: string;
  readonly moduleTag: string;
  readonly serviceId: string;
  readonly timestamps: Readonly<LifecycleTimestamps>;
  readonly formerlyAllocatedIds: readonly string[];
}

/** Frozen, JSON-ready view of a service as it is at the moment of the call. */
export function serializeService(service: SnapshotSource): ServiceSnapshot {
  const { timestamps } = service;
  return Object.freeze({
    typeTag: service.typeTag,
    moduleTag: service.moduleTag,
    lifecycle: Object.freeze({
      initTime: timestamps.initTime,
      startTime: timestamps.startTime,
      startDurationSeconds: timestamps.startDurationSeconds,
      stopTime: timestamps.stopTime,
      stopDurationSeconds: timestamps.stopDurationSeconds,
      cleanTime: timestamps.cleanTime,
    }),
    serviceId: service.serviceId,
    nodes: Object.freeze([...service.formerlyAllocatedIds]),
  });
}
