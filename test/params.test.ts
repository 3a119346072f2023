import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { normalizeParams, numeric, parseParams, requiredString, toParamShape } from '../src/runtime/params.js';
import { HandlerError } from '../src/handlers/errors.js';
import type { ParamSpec } from '../src/types/shared.js';

const order: ParamSpec[] = [
  { name: 'url' },
  { name: 'method', default: 'GET' },
  { name: 'headers' },
];

describe('toParamShape', () => {
  it('tags arrays as positional and objects as named', () => {
    expect(toParamShape(['a'])).toEqual({ kind: 'positional', values: ['a'] });
    expect(toParamShape({ a: 1 })).toEqual({ kind: 'named', values: { a: 1 } });
  });

  it('reads absent or scalar params as an empty mapping', () => {
    expect(toParamShape(undefined)).toEqual({ kind: 'named', values: {} });
    expect(toParamShape(null)).toEqual({ kind: 'named', values: {} });
    expect(toParamShape('x')).toEqual({ kind: 'named', values: {} });
  });
});

describe('normalizeParams', () => {
  it('maps positions onto the declared order', () => {
    expect(normalizeParams(['http://a', 'POST', { x: '1' }], order)).toEqual({
      url: 'http://a', method: 'POST', headers: { x: '1' },
    });
  });

  it('fills missing trailing positions from defaults and leaves the rest absent', () => {
    const params = normalizeParams(['http://a'], order);
    expect(params).toEqual({ url: 'http://a', method: 'GET' });
    expect('headers' in params).toBe(false);
  });

  it('ignores positions past the declared order', () => {
    expect(normalizeParams(['a', 'b', 'c', 'd'], order)).toEqual({ url: 'a', method: 'b', headers: 'c' });
  });

  it('passes a mapping through unchanged', () => {
    const named = { url: 'http://a', extra: true };
    expect(normalizeParams(named, order)).toBe(named);
  });

  it('yields an empty view for empty positional params with no defaults', () => {
    expect(normalizeParams([], [{ name: 'symbol' }])).toEqual({});
  });
});

describe('parseParams', () => {
  const schema = z.object({ url: requiredString('url'), limit: numeric('limit').default(5) });

  it('reports a missing field as required', () => {
    expect(() => parseParams(schema, {})).toThrow('url is required');
  });

  it('treats null and empty string as missing', () => {
    expect(() => parseParams(schema, { url: null })).toThrow('url is required');
    expect(() => parseParams(schema, { url: '' })).toThrow('url is required');
  });

  it('throws a validation HandlerError', () => {
    expect(() => parseParams(schema, {})).toThrow(HandlerError);
    expect(() => parseParams(schema, {})).toThrow(expect.objectContaining({ kind: 'validation' }));
  });

  it('coerces numeric strings and applies defaults', () => {
    expect(parseParams(schema, { url: 'u', limit: '3' })).toEqual({ url: 'u', limit: 3 });
    expect(parseParams(schema, { url: 'u' })).toEqual({ url: 'u', limit: 5 });
  });

  it('rejects non-numeric strings for numbers', () => {
    expect(() => parseParams(schema, { url: 'u', limit: 'many' })).toThrow('limit must be a number');
  });
});
