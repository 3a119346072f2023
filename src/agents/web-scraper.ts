import { z } from 'zod';
import { parseParams, requiredString } from '../runtime/params.js';
import { unsupportedError, upstreamError } from '../handlers/errors.js';
import { bodyJson, bodyText } from '../http/transport.js';
import { extractHtmlText } from '../text/html.js';
import type { CapabilityDefinition } from '../handlers/types.js';
import type { AgentDeps } from './deps.js';
import type { JsonObject, JsonValue } from '../types/shared.js';

const FULL_TEXT_CHARS = 5000;
const EXCERPT_RADIUS = 80;

const ParamsSchema = z.object({
  url: requiredString('url'),
  selector: z.union([z.string(), z.number()]).transform(String).optional(),
  format: z.string().default('text'),
});

export function textResult(text: string, selector?: string): JsonObject {
  const full_text = text.slice(0, FULL_TEXT_CHARS);
  if (!selector) return { full_text };

  const idx = text.toLowerCase().indexOf(selector.toLowerCase());
  const excerpt = idx >= 0 ? text.slice(Math.max(0, idx - EXCERPT_RADIUS), idx + EXCERPT_RADIUS) : '';
  return { excerpt, full_text };
}

export function webScraperAgent(deps: Pick<AgentDeps, 'transport'>): CapabilityDefinition {
  return {
    card: {
      name: 'WebScraper-v1',
      description: 'Fetches a URL and returns text/json content.',
      inputs: ['url', 'selector', 'format'],
      cost_per_op: 0.3,
      version: '1.0.0',
    },
    params: [
      { name: 'url' },
      { name: 'selector' },
      { name: 'format', default: 'text' },
    ],

    async compute(raw): Promise<JsonValue> {
      const params = parseParams(ParamsSchema, raw);
      const format = params.format.toLowerCase();
      if (format === 'screenshot') {
        throw unsupportedError('Screenshot is not supported by this agent; use a headless browser provider.');
      }
      if (format !== 'text' && format !== 'json' && format !== 'raw') {
        throw unsupportedError('format must be text/json/raw');
      }

      const res = await deps.transport.send({ url: params.url, timeoutMs: 20_000 });
      if (!res.ok) throw upstreamError(`HTTP ${res.status}: ${bodyText(res)}`);

      switch (format) {
        case 'json':
          return bodyJson(res);
        case 'raw':
          return bodyText(res);
        default:
          return textResult(extractHtmlText(bodyText(res)), params.selector);
      }
    },
  };
}
