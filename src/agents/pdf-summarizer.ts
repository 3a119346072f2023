import { z } from 'zod';
import { parseParams, requiredString } from '../runtime/params.js';
import { errorMessage, unsupportedError, upstreamError, validationError } from '../handlers/errors.js';
import { extractPdfText, isPdf } from '../text/pdf.js';
import { quietLogger, type Logger } from '../logger.js';
import type { CapabilityDefinition } from '../handlers/types.js';
import type { TextCompleter } from '../llm/chat.js';
import type { AgentDeps } from './deps.js';
import type { JsonValue } from '../types/shared.js';

const CONTEXT_CHARS = 6000;
const FALLBACK_CHARS = 500;

const ParamsSchema = z.object({
  source: requiredString('source'),
  task: z.string().default('summary'),
  question: z.string().optional(),
  provider: z.string().default('openai'),
  model: z.string().optional(),
});

export async function decodeText(data: Buffer, log: Logger = quietLogger): Promise<string> {
  if (isPdf(data)) {
    try {
      return await extractPdfText(data);
    } catch (e) {
      log(`pdf parse failed, reading as text: ${errorMessage(e)}`);
    }
  }
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(data);
  } catch {
    return '';
  }
}

export function summaryPrompt(text: string): string {
  return `Summarize the following text in 5 bullet points:\n\n${text.slice(0, CONTEXT_CHARS)}`;
}

export function qaPrompt(text: string, question: string): string {
  return `Answer based only on the context:\n\nContext:\n${text.slice(0, CONTEXT_CHARS)}\n\nQuestion: ${question}`;
}

type SummarizerDeps = Pick<AgentDeps, 'transport' | 'completers' | 'log'>;

export function pdfSummarizerAgent(deps: SummarizerDeps): CapabilityDefinition {
  async function fetchSource(source: string): Promise<Buffer> {
    if (/^https?:\/\//i.test(source)) {
      const res = await deps.transport.send({ url: source, timeoutMs: 20_000 });
      if (!res.ok) throw upstreamError(`HTTP ${res.status}`);
      return res.body;
    }
    if (!/^[A-Za-z0-9+/=\s_-]+$/.test(source)) {
      throw validationError('source must be an http(s) URL or base64 content');
    }
    return Buffer.from(source, 'base64');
  }

  // Any LLM failure degrades to the head of the document.
  async function ask(completer: TextCompleter, prompt: string, text: string, model?: string): Promise<string> {
    try {
      return await completer.complete(prompt, { model, maxTokens: 200 });
    } catch (e) {
      deps.log(`${completer.provider} unavailable, returning excerpt: ${errorMessage(e)}`);
      return text.slice(0, FALLBACK_CHARS);
    }
  }

  return {
    card: {
      name: 'PDFSummarizer-v1',
      description: 'Fetches a document/PDF and returns summary or QA answer.',
      inputs: ['source', 'task', 'question', 'provider'],
      cost_per_op: 0.7,
      version: '1.0.0',
    },
    params: [
      { name: 'source' },
      { name: 'task', default: 'summary' },
      { name: 'question' },
      { name: 'provider' },
    ],

    async compute(raw): Promise<JsonValue> {
      const params = parseParams(ParamsSchema, raw);
      const task = params.task.toLowerCase();
      if (task !== 'summary' && task !== 'qa') throw unsupportedError('task must be summary or qa');
      if (task === 'qa' && !params.question) throw validationError('question is required for qa');

      const text = await decodeText(await fetchSource(params.source), deps.log);
      if (!text.trim()) throw upstreamError('Failed to extract text');

      const completer = params.provider.toLowerCase() === 'huggingface'
        ? deps.completers.huggingface
        : deps.completers.openai;

      if (task === 'qa' && params.question) {
        return { answer: await ask(completer, qaPrompt(text, params.question), text, params.model) };
      }
      return { summary: await ask(completer, summaryPrompt(text), text, params.model) };
    },
  };
}
