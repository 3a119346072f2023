import type { ServiceCardTemplate } from '../handlers/types.js';
import type { Result, ServiceCard } from '../types/shared.js';
import type { Embedder } from './embedder.js';
import type { Logger } from '../logger.js';

export function cardEmbeddingText(card: ServiceCardTemplate): string {
  return [card.name, card.description, ...(card.tags ?? [])].join(' ').trim();
}

async function tryEmbed(embedder: Embedder, text: string): Promise<Result<number[]>> {
  try {
    return { ok: true, value: await embedder.embed(text) };
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e : new Error(String(e)) };
  }
}

/**
 * Builds the immutable card once. Embedding is best-effort: any failure
 * leaves the `embedding` key out and is only logged.
 */
export async function buildServiceCard(
  template: ServiceCardTemplate,
  embedder?: Embedder,
  log?: Logger,
): Promise<ServiceCard> {
  const card: ServiceCard = {
    ...template,
    inputs: [...template.inputs],
    ...(template.tags ? { tags: [...template.tags] } : {}),
  };

  if (embedder) {
    const embedding = await tryEmbed(embedder, cardEmbeddingText(template));
    if (embedding.ok) {
      card.embedding = [...embedding.value];
    } else {
      log?.(`embedding skipped for ${template.name}: ${embedding.error.message}`);
    }
  }

  Object.freeze(card.inputs);
  if (card.tags) Object.freeze(card.tags);
  if (card.embedding) Object.freeze(card.embedding);
  return Object.freeze(card);
}
