import { describe, it, expect } from 'vitest';
import { calcAgent, factorial } from '../../src/agents/calc.js';

const compute = calcAgent().compute;

describe('factorial', () => {
  it('returns exact numbers while they are safe integers', () => {
    expect(factorial(0)).toBe(1);
    expect(factorial(5)).toBe(120);
    expect(factorial(18)).toBe(6402373705728000);
  });

  it('switches to a decimal string past the safe integer range', () => {
    expect(factorial(25)).toBe('15511210043330985984000000');
  });

  it('truncates fractional input', () => {
    expect(factorial(4.9)).toBe(24);
    expect(factorial(-0.5)).toBe(1);
  });

  it('rejects negatives and very large inputs', () => {
    expect(() => factorial(-1)).toThrow('factorial is not defined for negative values');
    expect(() => factorial(10_001)).toThrow('factorial is limited to numbers up to 10000');
    expect(() => factorial(Infinity)).toThrow('factorial is limited to numbers up to 10000');
  });
});

describe('calcAgent', () => {
  it('defaults to sqrt', async () => {
    await expect(compute({ number: '9' })).resolves.toBe(3);
    await expect(compute({ number: 2.25 })).resolves.toBe(1.5);
  });

  it('computes factorial on request', async () => {
    await expect(compute({ number: 5, operation: 'factorial' })).resolves.toBe(120);
  });

  it('validates input', async () => {
    await expect(compute({})).rejects.toThrow('number is required');
    await expect(compute({ number: 'nine' })).rejects.toThrow('number must be a number');
    await expect(compute({ number: -4 })).rejects.toThrow('sqrt is not defined for negative numbers');
  });

  it('rejects unknown operations', async () => {
    await expect(compute({ number: 1, operation: 'cube' })).rejects.toThrow(
      expect.objectContaining({ kind: 'unsupported', message: 'Unknown operation' }),
    );
  });
});
