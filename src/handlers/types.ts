import type { JsonValue, NormalizedParams, ParamSpec, ServiceCard } from '../types/shared.js';

export type ServiceCardTemplate = Omit<ServiceCard, 'embedding'>;

/** Declaration of one capability, before its card is built. */
export interface CapabilityDefinition {
  card: ServiceCardTemplate;
  params: readonly ParamSpec[];
  compute(params: NormalizedParams): Promise<JsonValue>;
}

export interface CapabilityHandler {
  /** Positional order and defaults used to normalize list params. */
  readonly params: readonly ParamSpec[];
  describe(): ServiceCard;
  compute(params: NormalizedParams): Promise<JsonValue>;
}
