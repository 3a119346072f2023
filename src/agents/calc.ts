import { z } from 'zod';
import { numeric, parseParams } from '../runtime/params.js';
import { unsupportedError, validationError } from '../handlers/errors.js';
import type { CapabilityDefinition } from '../handlers/types.js';

const ParamsSchema = z.object({
  number: numeric('number'),
  operation: z.string({ invalid_type_error: 'operation must be a string' }).default('sqrt'),
});

const MAX_FACTORIAL = 10_000;

export function factorial(n: number): number | string {
  const k = Math.trunc(n);
  if (k < 0) throw validationError('factorial is not defined for negative values');
  if (!Number.isFinite(k) || k > MAX_FACTORIAL) {
    throw validationError(`factorial is limited to numbers up to ${MAX_FACTORIAL}`);
  }
  let acc = 1n;
  for (let i = 2n; i <= BigInt(k); i++) acc *= i;
  return acc <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(acc) : acc.toString();
}

export function calcAgent(): CapabilityDefinition {
  return {
    card: {
      name: 'MathOracle-v1',
      description: 'Calculates square roots and factorial.',
      inputs: ['number', 'operation'],
      cost_per_op: 0.5,
      version: '1.0.0',
      tags: ['math', 'sqrt', 'factorial', 'calculator'],
    },
    params: [{ name: 'number' }, { name: 'operation', default: 'sqrt' }],

    async compute(raw) {
      const params = parseParams(ParamsSchema, raw);
      switch (params.operation) {
        case 'sqrt':
          if (params.number < 0) throw validationError('sqrt is not defined for negative numbers');
          return Math.sqrt(params.number);
        case 'factorial':
          return factorial(params.number);
        default:
          throw unsupportedError('Unknown operation');
      }
    },
  };
}
