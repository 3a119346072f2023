import { z } from 'zod';
import { numeric, parseParams, requiredString } from '../runtime/params.js';
import { unsupportedError, validationError } from '../handlers/errors.js';
import { bodyText } from '../http/transport.js';
import type { CapabilityDefinition } from '../handlers/types.js';
import type { AgentDeps } from './deps.js';
import type { JsonObject } from '../types/shared.js';

const DAY_MS = 24 * 60 * 60 * 1000;

const ParamsSchema = z.object({
  target: requiredString('target'),
  kind: z.string({ invalid_type_error: 'kind must be ping/http/tls' }).default('ping'),
  threshold_ms: numeric('threshold_ms').optional(),
});

export function parseHostPort(target: string): { host: string; port: number } {
  const [host, portText = '443'] = target.split(':');
  const port = Number(portText);
  if (!host || !Number.isInteger(port) || port <= 0 || port > 65535) {
    throw validationError(`Invalid TLS target: ${target}`);
  }
  return { host, port };
}

type MonitorDeps = Pick<AgentDeps, 'transport' | 'runCommand' | 'tlsProbe' | 'now'>;

export function monitorAgent(deps: MonitorDeps): CapabilityDefinition {
  async function ping(target: string): Promise<JsonObject> {
    // would otherwise be read as a ping flag
    if (target.startsWith('-')) throw validationError('target must be a hostname or address');
    const { code, stdout, stderr } = await deps.runCommand('ping', ['-c', '3', target], { timeoutMs: 15_000 });
    return { code, stdout, stderr };
  }

  async function http(url: string): Promise<JsonObject> {
    const start = deps.now();
    const res = await deps.transport.send({ url, timeoutMs: 10_000 });
    const latencyMs = deps.now() - start;
    const text = bodyText(res);
    if (!res.ok) return { status: res.status, latency_ms: latencyMs, error: text };
    return { status: res.status, latency_ms: latencyMs, body_snippet: text.slice(0, 2000) };
  }

  async function tls(target: string): Promise<JsonObject> {
    const { host, port } = parseHostPort(target);
    const { validTo } = await deps.tlsProbe(host, port, { timeoutMs: 5_000 });
    const expiresAt = Date.parse(validTo);
    if (Number.isNaN(expiresAt)) {
      return { expires_at: validTo, days_left: null };
    }
    return { expires_at: validTo, days_left: Math.floor((expiresAt - deps.now()) / DAY_MS) };
  }

  return {
    card: {
      name: 'Monitor-v1',
      description: 'Performs ping, HTTP, or TLS expiry checks.',
      inputs: ['target', 'kind', 'threshold_ms'],
      cost_per_op: 0.2,
      version: '1.0.0',
    },
    params: [
      { name: 'target' },
      { name: 'kind', default: 'ping' },
      { name: 'threshold_ms' },
    ],

    async compute(raw) {
      const params = parseParams(ParamsSchema, raw);

      let result: JsonObject;
      switch (params.kind.toLowerCase()) {
        case 'ping': result = await ping(params.target); break;
        case 'http': result = await http(params.target); break;
        case 'tls': result = await tls(params.target); break;
        default: throw unsupportedError('kind must be ping/http/tls');
      }

      const latency = result.latency_ms;
      if (params.threshold_ms && typeof latency === 'number') {
        result.slow = latency > params.threshold_ms;
      }
      return result;
    },
  };
}
