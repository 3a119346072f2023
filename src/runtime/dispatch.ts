import { normalizeParams } from './params.js';
import { errorMessage } from '../handlers/errors.js';
import type { CapabilityHandler } from '../handlers/types.js';
import {
  METHOD_COMPUTE, METHOD_INITIALIZE, METHOD_NOT_FOUND,
  type AgentRequest, type AgentResponse,
} from '../types/shared.js';

/**
 * Resolves one request to exactly one response. Never rejects: every
 * handler-side failure becomes `error`.
 */
export async function dispatch(request: AgentRequest, handler: CapabilityHandler): Promise<AgentResponse> {
  const { id } = request;

  if (request.method === METHOD_INITIALIZE) {
    return { id, result: handler.describe(), error: null };
  }

  if (request.method !== METHOD_COMPUTE) {
    return { id, result: null, error: METHOD_NOT_FOUND };
  }

  try {
    const params = normalizeParams(request.params, handler.params);
    const result = await handler.compute(params);
    return { id, result: result ?? null, error: null };
  } catch (e) {
    return { id, result: null, error: errorMessage(e) };
  }
}
