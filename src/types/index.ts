export const OsType = {
  LINUX: 'linux',
  WINDOWS: 'windows',
} as const;

export type OsType = typeof OsType[keyof typeof OsType];

export const SUPPORTED_OS_TYPES: readonly OsType[] = [OsType.LINUX, OsType.WINDOWS];

export const DEFAULT_OS_TYPE: OsType = OsType.LINUX;

/** Validated resource request: OS type -> number of nodes. */
export type NodeSpec = Partial<Record<OsType, number>>;

export interface NodeRequest {
  numNodes?: number;
  /** Takes precedence over numNodes when both are given. */
  nodeSpec?: Record<string, number>;
}

export interface LogDescriptor {
  path: string;
  collectDefault: boolean;
}

export type LogDescriptors = Record<string, LogDescriptor>;

/** Epoch seconds; null until the corresponding lifecycle event has happened. */
export interface LifecycleTimestamps {
  initTime: number;
  startTime: number | null;
  startDurationSeconds: number | null;
  stopTime: number | null;
  stopDurationSeconds: number | null;
  cleanTime: number | null;
}

export interface ServiceIdentity {
  typeTag: string;
  order: number;
  instanceId: number;
}

export interface ServiceSnapshot {
  readonly typeTag: string;
  readonly moduleTag: string;
  readonly lifecycle: Readonly<LifecycleTimestamps>;
  readonly serviceId: string;
  readonly nodes: readonly string[];
}

export type LogLevelType = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

export interface HarnessConfig {
  logLevel: LogLevelType;
  logFile?: string;
  logToConsole: boolean;
  waitTimeoutSec: number;
  scratchRoot: string;
}
