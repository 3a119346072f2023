import { bodyJson, bodyText, type HttpTransport } from '../http/transport.js';

export interface LLMConfig {
  apiKey: string;
  model: string;
  baseUrl: string;
}

export interface CompletionOptions {
  model?: string;
  maxTokens?: number;
}

export interface TextCompleter {
  provider: string;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

function messageContent(payload: unknown): string | undefined {
  if (!payload || typeof payload !== 'object' || !('choices' in payload)) return undefined;
  const choices = payload.choices;
  if (!Array.isArray(choices)) return undefined;
  const choice: unknown = choices[0];
  if (!choice || typeof choice !== 'object' || !('message' in choice)) return undefined;
  const message = choice.message;
  if (!message || typeof message !== 'object' || !('content' in message)) return undefined;
  return typeof message.content === 'string' ? message.content : undefined;
}

/** Single-turn chat completion against an OpenAI-compatible endpoint. */
export class OpenAICompleter implements TextCompleter {
  provider = 'openai';
  private config: LLMConfig;
  private transport: HttpTransport;

  constructor(config: LLMConfig, transport: HttpTransport) {
    this.config = config;
    this.transport = transport;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    if (!this.config.apiKey) throw new Error('LLM_API_KEY is not set');

    const res = await this.transport.send({
      url: `${this.config.baseUrl}/chat/completions`,
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify({
        model: options.model || this.config.model,
        messages: [{ role: 'user', content: prompt }],
        max_tokens: options.maxTokens ?? 200,
      }),
      timeoutMs: 30_000,
    });

    if (!res.ok) {
      throw new Error(`OpenAI API error: ${res.status} ${bodyText(res)}`);
    }
    const content = messageContent(bodyJson(res));
    if (content === undefined) throw new Error('No choices in response');
    return content;
  }
}

function generatedText(payload: unknown): string | undefined {
  const first: unknown = Array.isArray(payload) ? payload[0] : payload;
  if (!first || typeof first !== 'object' || !('generated_text' in first)) return undefined;
  return typeof first.generated_text === 'string' ? first.generated_text : undefined;
}

/** Text generation through the Hugging Face Inference API. */
export class HuggingFaceCompleter implements TextCompleter {
  provider = 'huggingface';
  private config: LLMConfig;
  private transport: HttpTransport;

  constructor(config: LLMConfig, transport: HttpTransport) {
    this.config = config;
    this.transport = transport;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    if (!this.config.apiKey) throw new Error('HF_API_TOKEN is not set');

    const model = options.model || this.config.model;
    const res = await this.transport.send({
      url: `${this.config.baseUrl}/models/${model}`,
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify({
        inputs: prompt,
        parameters: { max_new_tokens: options.maxTokens ?? 200, return_full_text: false },
      }),
      timeoutMs: 30_000,
    });

    if (!res.ok) {
      throw new Error(`Hugging Face API error: ${res.status} ${bodyText(res)}`);
    }
    const text = generatedText(bodyJson(res));
    if (text === undefined) throw new Error('No generated text in response');
    return text;
  }
}
