import { z } from 'zod';
import { parseParams, requiredString } from '../runtime/params.js';
import { unsupportedError, validationError } from '../handlers/errors.js';
import { bodyText } from '../http/transport.js';
import type { CapabilityDefinition } from '../handlers/types.js';
import type { AgentDeps } from './deps.js';
import type { JsonValue } from '../types/shared.js';

const METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'] as const;

const ParamsSchema = z.object({
  url: requiredString('url'),
  method: z.string({ invalid_type_error: 'method must be a string' }).default('GET'),
  headers: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()]).transform(String), {
    invalid_type_error: 'headers must be an object',
  }).optional(),
  body: z.custom<JsonValue>().optional(),
});

export function prepareBody(body: JsonValue | undefined): { payload?: string; headers: Record<string, string> } {
  if (body === undefined || body === null) return { headers: {} };
  if (typeof body === 'string') return { payload: body, headers: {} };
  return { payload: JSON.stringify(body), headers: { 'Content-Type': 'application/json' } };
}

function isMethod(value: string): value is typeof METHODS[number] {
  return METHODS.some(m => m === value);
}

export function webhookAgent(deps: Pick<AgentDeps, 'transport'>): CapabilityDefinition {
  return {
    card: {
      name: 'WebhookCaller-v1',
      description: 'Calls arbitrary HTTP endpoints and returns status/body.',
      inputs: ['url', 'method', 'headers', 'body'],
      cost_per_op: 0.2,
      version: '1.0.0',
    },
    params: [
      { name: 'url' },
      { name: 'method', default: 'GET' },
      { name: 'headers' },
      { name: 'body' },
    ],

    async compute(raw) {
      const params = parseParams(ParamsSchema, raw);
      const method = params.method.toUpperCase();
      if (!isMethod(method)) throw unsupportedError(`method must be one of ${METHODS.join(', ')}`);

      const { payload, headers } = prepareBody(params.body);
      // fetch refuses a body on GET
      if (method === 'GET' && payload !== undefined) throw validationError('body is not allowed with GET');
      const res = await deps.transport.send({
        url: params.url,
        method,
        headers: { ...params.headers, ...headers },
        body: payload,
        timeoutMs: 20_000,
      });

      return { status: res.status, headers: res.headers, body: bodyText(res) };
    },
  };
}
