import { z } from 'zod';
import { parseParams, requiredString } from '../runtime/params.js';
import { upstreamError } from '../handlers/errors.js';
import { bodyJson } from '../http/transport.js';
import type { CapabilityDefinition } from '../handlers/types.js';
import type { AgentDeps } from './deps.js';

const TICKER_URL = 'https://api.binance.com/api/v3/ticker/price';

const ParamsSchema = z.object({ symbol: requiredString('symbol') });

const TickerSchema = z.object({ price: z.string() });

export function priceAgent(deps: Pick<AgentDeps, 'transport'>): CapabilityDefinition {
  return {
    card: {
      name: 'PriceOracle-v1',
      description: 'Returns the symbol price from Binance.',
      inputs: ['symbol'],
      cost_per_op: 0.5,
      version: '1.0.0',
    },
    params: [{ name: 'symbol' }],

    async compute(raw) {
      const { symbol } = parseParams(ParamsSchema, raw);
      const res = await deps.transport.send({
        url: `${TICKER_URL}?symbol=${encodeURIComponent(symbol.toUpperCase())}`,
        timeoutMs: 10_000,
      });
      if (!res.ok) throw upstreamError(`HTTP error: ${res.status}`);

      const ticker = TickerSchema.safeParse(bodyJson(res));
      if (!ticker.success) throw upstreamError('Unexpected ticker payload: missing price');
      return ticker.data.price;
    },
  };
}
