import { z } from 'zod';
import { parseParams } from '../runtime/params.js';
import { unsupportedError, upstreamError, validationError } from '../handlers/errors.js';
import { bodyText } from '../http/transport.js';
import type { CapabilityDefinition } from '../handlers/types.js';
import type { AgentDeps } from './deps.js';
import type { JsonObject, JsonValue } from '../types/shared.js';

const REQUIRED = 'base_url and entity_id are required';

const ParamsSchema = z.object({
  base_url: z.string({ required_error: REQUIRED }).min(1, REQUIRED),
  entity_id: z.string({ required_error: REQUIRED }).min(1, REQUIRED),
  action: z.string().default('get_state'),
  value: z.custom<JsonValue>().optional(),
  token: z.string().optional(),
  domain: z.string().optional(),
  service: z.string().optional(),
});

export function homeAssistantAgent(deps: Pick<AgentDeps, 'transport' | 'config'>): CapabilityDefinition {
  async function request(url: string, method: string, token: string, payload?: JsonObject): Promise<JsonObject> {
    const res = await deps.transport.send({
      url,
      method,
      headers: { 'Authorization': `Bearer ${token}`, 'Content-Type': 'application/json' },
      body: payload === undefined ? undefined : JSON.stringify(payload),
      timeoutMs: 15_000,
    });
    const text = bodyText(res);
    if (!res.ok) throw upstreamError(`HTTP ${res.status}: ${text}`);

    let body: JsonValue = {};
    if (text) {
      try {
        body = JSON.parse(text);
      } catch (e) {
        throw upstreamError(`Invalid JSON from Home Assistant (HTTP ${res.status})`, e);
      }
    }
    return { status: res.status, body };
  }

  return {
    card: {
      name: 'HomeAssistant-v1',
      description: 'Reads or sets entity state via Home Assistant REST API.',
      inputs: ['base_url', 'entity_id', 'action', 'value', 'service'],
      cost_per_op: 0.4,
      version: '1.0.0',
    },
    params: [
      { name: 'base_url' },
      { name: 'entity_id' },
      { name: 'action', default: 'get_state' },
      { name: 'value' },
    ],

    async compute(raw) {
      const params = parseParams(ParamsSchema, raw);
      const token = params.token || deps.config.homeAssistant.token;
      if (!token) throw validationError('HOME_ASSISTANT_TOKEN is not set');

      const base = params.base_url.replace(/\/+$/, '');
      const entity = params.entity_id;

      switch (params.action.toLowerCase()) {
        case 'get_state':
          return request(`${base}/api/states/${entity}`, 'GET', token);
        case 'set_state':
          return request(`${base}/api/states/${entity}`, 'POST', token, { state: params.value ?? null });
        case 'call_service': {
          const domain = params.domain || entity.split('.')[0];
          const service = params.service || 'turn_on';
          const payload: JsonObject = { entity_id: entity };
          if (params.value !== undefined) payload.value = params.value;
          return request(`${base}/api/services/${domain}/${service}`, 'POST', token, payload);
        }
        default:
          throw unsupportedError('Unknown action. Use get_state, set_state, or call_service.');
      }
    },
  };
}
