import type { AgentRequest, AgentResponse, JsonValue } from '../types/shared.js';

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Decodes one input line. Returns null for anything that is not a JSON
 * object; such lines have no id to correlate a response with.
 */
export function decodeRequest(line: string): AgentRequest | null {
  let value: JsonValue;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }
  if (!isJsonObject(value)) return null;

  return {
    method: typeof value.method === 'string' ? value.method : '',
    params: value.params,
    id: value.id ?? null,
  };
}

export function encodeResponse(response: AgentResponse): string {
  const ordered = { id: response.id, result: response.result, error: response.error };
  try {
    return JSON.stringify(ordered);
  } catch {
    return JSON.stringify({ id: response.id, result: null, error: 'Result is not JSON-serializable' });
  }
}
