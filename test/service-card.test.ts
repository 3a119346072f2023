import { describe, it, expect, vi } from 'vitest';
import { buildServiceCard, cardEmbeddingText } from '../src/cards/service-card.js';
import { createHandler } from '../src/handlers/create.js';
import type { Embedder } from '../src/cards/embedder.js';
import type { ServiceCardTemplate } from '../src/handlers/types.js';

const template: ServiceCardTemplate = {
  name: 'PriceOracle-v1',
  description: 'Fetches spot prices.',
  inputs: ['symbol'],
  cost_per_op: 0.1,
  version: '1.0.0',
  tags: ['crypto', 'price'],
};

function fixedEmbedder(vector: number[]): Embedder & { texts: string[] } {
  const texts: string[] = [];
  return {
    texts,
    async embed(text) {
      texts.push(text);
      return vector;
    },
  };
}

describe('cardEmbeddingText', () => {
  it('joins name, description and tags', () => {
    expect(cardEmbeddingText(template)).toBe('PriceOracle-v1 Fetches spot prices. crypto price');
  });

  it('works without tags', () => {
    const { tags: _tags, ...untagged } = template;
    expect(cardEmbeddingText(untagged)).toBe('PriceOracle-v1 Fetches spot prices.');
  });
});

describe('buildServiceCard', () => {
  it('copies the template without an embedding when no embedder is given', async () => {
    const card = await buildServiceCard(template);
    expect(card).toEqual(template);
    expect('embedding' in card).toBe(false);
  });

  it('attaches the embedding vector on success', async () => {
    const embedder = fixedEmbedder([0.25, -0.5]);
    const card = await buildServiceCard(template, embedder);
    expect(card.embedding).toEqual([0.25, -0.5]);
    expect(embedder.texts).toEqual(['PriceOracle-v1 Fetches spot prices. crypto price']);
  });

  it('omits the embedding key and logs when embedding fails', async () => {
    const log = vi.fn();
    const embedder: Embedder = { embed: async () => { throw new Error('LLM_API_KEY is not set'); } };
    const card = await buildServiceCard(template, embedder, log);
    expect('embedding' in card).toBe(false);
    expect(log).toHaveBeenCalledWith('embedding skipped for PriceOracle-v1: LLM_API_KEY is not set');
  });

  it('returns a deeply frozen card', async () => {
    const card = await buildServiceCard(template, fixedEmbedder([1]));
    expect(Object.isFrozen(card)).toBe(true);
    expect(Object.isFrozen(card.inputs)).toBe(true);
    expect(Object.isFrozen(card.tags)).toBe(true);
    expect(Object.isFrozen(card.embedding)).toBe(true);
  });

  it('does not share arrays with the template', async () => {
    const card = await buildServiceCard(template);
    expect(card.inputs).not.toBe(template.inputs);
    expect(card.tags).not.toBe(template.tags);
  });
});

describe('createHandler', () => {
  it('embeds once and serves the same card on every describe', async () => {
    const embedder = fixedEmbedder([0.1]);
    const handler = await createHandler({ card: template, params: [{ name: 'symbol' }], compute: async () => null }, { embedder });
    expect(handler.describe()).toBe(handler.describe());
    expect(embedder.texts).toHaveLength(1);
    expect(Object.isFrozen(handler)).toBe(true);
    expect(Object.isFrozen(handler.params)).toBe(true);
  });
});
