export interface Registrable {
  /** Peers are grouped by this identity, normally the concrete constructor. */
  readonly serviceType: object;
  readonly typeTag: string;
  toString(): string;
}

export interface Registration {
  order: number;
  instanceId: number;
}

export interface IServiceRegistry<T extends Registrable = Registrable> {
  readonly runId: string;
  readonly services: readonly T[];
  register(service: T): Registration;
  describe(): string;
}
