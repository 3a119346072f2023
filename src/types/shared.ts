export const METHOD_INITIALIZE = 'initialize';
export const METHOD_COMPUTE = 'compute';
export const METHOD_NOT_FOUND = 'Method not found';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export interface ServiceCard {
  name: string;
  description: string;
  inputs: string[];               // documentation only
  cost_per_op: number;
  version: string;
  tags?: string[];
  embedding?: number[];           // absent when enrichment failed or is disabled
}

// One decoded input line
export interface AgentRequest {
  method: string;
  params?: JsonValue;             // array or object; anything else reads as {}
  id: JsonValue;                  // echoed back verbatim
}

// One encoded output line
export interface AgentResponse {
  id: JsonValue;
  result: JsonValue | ServiceCard;
  error: string | null;
}

export type NormalizedParams = Readonly<Record<string, JsonValue>>;

export interface ParamSpec {
  name: string;
  default?: JsonValue;
}

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };
