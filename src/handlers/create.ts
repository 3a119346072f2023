import { buildServiceCard } from '../cards/service-card.js';
import type { Embedder } from '../cards/embedder.js';
import type { Logger } from '../logger.js';
import type { CapabilityDefinition, CapabilityHandler } from './types.js';

export interface CreateHandlerOptions {
  embedder?: Embedder;
  log?: Logger;
}

/** Builds the card once and returns a frozen handler around `definition`. */
export async function createHandler(
  definition: CapabilityDefinition,
  options: CreateHandlerOptions = {},
): Promise<CapabilityHandler> {
  const card = await buildServiceCard(definition.card, options.embedder, options.log);
  const params = Object.freeze([...definition.params]);

  return Object.freeze({
    params,
    describe: () => card,
    compute: (input) => definition.compute(input),
  } satisfies CapabilityHandler);
}
