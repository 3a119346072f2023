import { bodyJson, bodyText, type HttpTransport } from '../http/transport.js';

export interface Embedder {
  embed(text: string): Promise<number[]>;
}

export interface EmbedderConfig {
  apiKey: string;
  model: string;
  baseUrl: string;
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(v => typeof v === 'number');
}

function firstEmbedding(payload: unknown): number[] | undefined {
  if (!payload || typeof payload !== 'object' || !('data' in payload)) return undefined;
  const data = payload.data;
  if (!Array.isArray(data) || data.length === 0) return undefined;
  const first: unknown = data[0];
  if (!first || typeof first !== 'object' || !('embedding' in first)) return undefined;
  return isNumberArray(first.embedding) ? first.embedding : undefined;
}

/** OpenAI-compatible `/embeddings` client. */
export class OpenAIEmbedder implements Embedder {
  private config: EmbedderConfig;
  private transport: HttpTransport;

  constructor(config: EmbedderConfig, transport: HttpTransport) {
    this.config = config;
    this.transport = transport;
  }

  async embed(text: string): Promise<number[]> {
    if (!this.config.apiKey) throw new Error('LLM_API_KEY is not set');

    const res = await this.transport.send({
      url: `${this.config.baseUrl}/embeddings`,
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify({ model: this.config.model, input: text }),
      timeoutMs: 15_000,
    });
    if (!res.ok) {
      throw new Error(`Embeddings API error: ${res.status} ${bodyText(res)}`);
    }
    const embedding = firstEmbedding(bodyJson(res));
    if (!embedding) throw new Error('No embedding in response');
    return embedding;
  }
}
