import { z } from 'zod';
import { validationError } from '../handlers/errors.js';
import type { JsonValue, NormalizedParams, ParamSpec } from '../types/shared.js';

export type ParamShape =
  | { kind: 'positional'; values: readonly JsonValue[] }
  | { kind: 'named'; values: Readonly<Record<string, JsonValue>> };

export function toParamShape(raw: JsonValue | undefined): ParamShape {
  if (Array.isArray(raw)) return { kind: 'positional', values: raw };
  if (raw !== null && typeof raw === 'object') return { kind: 'named', values: raw };
  return { kind: 'named', values: {} };
}

/**
 * Collapses either param shape into a single named view.
 *
 * Positional values are mapped onto `order`; a position past the end of the
 * list takes the declared default, or stays absent when there is none. Extra
 * positions are ignored. Named params pass through as given.
 */
export function normalizeParams(raw: JsonValue | undefined, order: readonly ParamSpec[]): NormalizedParams {
  const shape = toParamShape(raw);
  if (shape.kind === 'named') return shape.values;

  const named: Record<string, JsonValue> = {};
  order.forEach((spec, i) => {
    if (i < shape.values.length) {
      named[spec.name] = shape.values[i];
    } else if (spec.default !== undefined) {
      named[spec.name] = spec.default;
    }
  });
  return named;
}

/**
 * Validates a normalized view against a handler's schema. `null` reads as
 * absent so that positional gaps and explicit nulls behave the same.
 */
export function parseParams<S extends z.ZodTypeAny>(schema: S, params: NormalizedParams): z.output<S> {
  const present: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== null) present[key] = value;
  }
  const parsed = schema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw validationError(issue ? issue.message : 'Invalid params');
  }
  return parsed.data;
}

/** Required non-empty string. */
export function requiredString(name: string, message = `${name} is required`) {
  return z
    .string({ required_error: message, invalid_type_error: `${name} must be a string` })
    .min(1, message);
}

/** Number, also accepted as a numeric string. */
export function numeric(name: string) {
  return z.preprocess(
    v => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
    z.number({ required_error: `${name} is required`, invalid_type_error: `${name} must be a number` }),
  );
}
