import { z } from 'zod';
import { numeric, parseParams, requiredString } from '../runtime/params.js';
import { upstreamError } from '../handlers/errors.js';
import { bodyJson, bodyText } from '../http/transport.js';
import type { CapabilityDefinition } from '../handlers/types.js';
import type { AgentDeps } from './deps.js';
import type { JsonObject } from '../types/shared.js';

const POOLS_URL = 'https://yields.llama.fi/pools';

const ParamsSchema = z.object({
  token_symbol: requiredString('token_symbol'),
  chain: z.string({ invalid_type_error: 'chain must be a string' }).optional(),
  min_tvl: numeric('min_tvl').optional(),
  limit: numeric('limit').default(5).transform(n => Math.max(0, Math.trunc(n))),
});

// DefiLlama fields are loosely typed; anything missing is treated as absent.
const PoolSchema = z.object({
  pool: z.string().nullish(),
  project: z.string().nullish(),
  symbol: z.string().nullish(),
  chain: z.string().nullish(),
  apy: z.number().nullish(),
  tvlUsd: z.number().nullish(),
  apyBase: z.number().nullish(),
  apyReward: z.number().nullish(),
  ilRisk: z.string().nullish(),
  exposure: z.string().nullish(),
}).passthrough();

export type Pool = z.infer<typeof PoolSchema>;

const PoolsPayloadSchema = z.object({ data: z.array(z.unknown()).default([]) });

export interface PoolFilter {
  tokenSymbol: string;
  chain?: string;
  minTvl?: number;
  limit: number;
}

const round2 = (n: number) => Math.round(n * 100) / 100;

export function filterAndSortPools(pools: Pool[], filter: PoolFilter): Pool[] {
  const token = filter.tokenSymbol.toLowerCase();
  const chain = filter.chain?.toLowerCase();

  return pools
    .filter(p => {
      if (!p.symbol || p.apy == null) return false;
      if (!p.symbol.toLowerCase().includes(token)) return false;
      if (chain && (p.chain ?? '').toLowerCase() !== chain) return false;
      if (filter.minTvl && (p.tvlUsd ?? 0) < filter.minTvl) return false;
      return true;
    })
    .sort((a, b) => (b.apy ?? 0) - (a.apy ?? 0))
    .slice(0, filter.limit);
}

export function formatPool(pool: Pool): JsonObject {
  return {
    pool_id: pool.pool ?? null,
    project: pool.project ?? null,
    symbol: pool.symbol ?? null,
    chain: pool.chain ?? null,
    apy: round2(pool.apy ?? 0),
    tvl_usd: round2(pool.tvlUsd ?? 0),
    apr_base: pool.apyBase ? round2(pool.apyBase) : null,
    apr_reward: pool.apyReward ? round2(pool.apyReward) : null,
    il_risk: pool.ilRisk ?? 'unknown',
    exposure: pool.exposure ?? 'unknown',
  };
}

export function defiApyAgent(deps: Pick<AgentDeps, 'transport'>): CapabilityDefinition {
  async function fetchPools(): Promise<Pool[]> {
    const res = await deps.transport.send({ url: POOLS_URL, timeoutMs: 30_000 });
    if (!res.ok) throw upstreamError(`HTTP ${res.status}: ${bodyText(res)}`);

    const payload = PoolsPayloadSchema.safeParse(bodyJson(res));
    if (!payload.success) throw upstreamError('Unexpected pools payload');
    const pools: Pool[] = [];
    for (const entry of payload.data.data) {
      const parsed = PoolSchema.safeParse(entry);
      if (parsed.success) pools.push(parsed.data);
    }
    return pools;
  }

  return {
    card: {
      name: 'DefiAPY-v1',
      description: 'Finds the best DeFi pools by APY for a given token across multiple chains using DefiLlama.',
      inputs: ['token_symbol', 'chain', 'min_tvl', 'limit'],
      cost_per_op: 0.3,
      version: '1.0.0',
      tags: ['defi', 'apy', 'yield', 'farming', 'pools', 'defillama'],
    },
    params: [
      { name: 'token_symbol' },
      { name: 'chain' },
      { name: 'min_tvl' },
      { name: 'limit', default: 5 },
    ],

    async compute(raw) {
      const params = parseParams(ParamsSchema, raw);
      const top = filterAndSortPools(await fetchPools(), {
        tokenSymbol: params.token_symbol,
        chain: params.chain,
        minTvl: params.min_tvl,
        limit: params.limit,
      });
      const pools = top.map(formatPool);

      return {
        token: params.token_symbol,
        chain: params.chain ?? null,
        min_tvl: params.min_tvl ?? null,
        total_found: pools.length,
        pools,
      };
    },
  };
}
