import { z } from 'zod';
import { VERSION } from '../version.js';

const flag = z.preprocess(
  v => (typeof v === 'string' ? ['1', 'true', 'yes'].includes(v.toLowerCase()) : v),
  z.boolean().default(false),
);

const ConfigSchema = z.object({
  http: z.object({
    timeoutMs: z.number().int().positive().default(20_000),
    userAgent: z.string().default(`tool-agents/${VERSION}`),
  }),
  llm: z.object({
    apiKey: z.string().default(''),
    model: z.string().default('gpt-4o-mini'),
    baseUrl: z.string().default('https://api.openai.com/v1'),
  }),
  huggingface: z.object({
    apiKey: z.string().default(''),
    model: z.string().default('gpt2'),
    baseUrl: z.string().default('https://api-inference.huggingface.co'),
  }),
  embeddings: z.object({
    enabled: flag,
    model: z.string().default('text-embedding-3-small'),
  }),
  homeAssistant: z.object({
    token: z.string().default(''),
  }),
  log: z.object({
    quiet: flag,
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

// Credentials default to empty: a missing key is reported by the agent that
// needs it, at compute time.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return ConfigSchema.parse({
    http: {
      timeoutMs: Number(env.AGENT_HTTP_TIMEOUT_MS) || undefined,
      userAgent: env.AGENT_USER_AGENT || undefined,
    },
    llm: {
      apiKey: env.LLM_API_KEY || env.OPENAI_API_KEY || undefined,
      model: env.LLM_MODEL || undefined,
      baseUrl: env.LLM_BASE_URL?.replace(/\/+$/, '') || undefined,
    },
    huggingface: {
      apiKey: env.HF_API_TOKEN || env.HUGGINGFACE_API_KEY || undefined,
      model: env.HF_MODEL || undefined,
      baseUrl: env.HF_BASE_URL?.replace(/\/+$/, '') || undefined,
    },
    embeddings: {
      enabled: env.AGENT_EMBEDDINGS || undefined,
      model: env.EMBEDDINGS_MODEL || undefined,
    },
    homeAssistant: {
      token: env.HOME_ASSISTANT_TOKEN || undefined,
    },
    log: {
      quiet: env.AGENT_QUIET || undefined,
    },
  });
}
