import { describe, it, expect } from 'vitest';
import { FeeSampler, feeRangeFromCommission } from './feeSampler';
import { SpendValidationError } from '../types/SpendTypes';

function sequence(values: number[]): () => number {
  let index = 0;
  return () => values[index++ % values.length];
}

describe('FeeSampler', () => {
  it('should return the fixed fee when min equals max', () => {
    const sampler = new FeeSampler({ min: 5, max: 5 }, () => {
      throw new Error('random source should not be used');
    });

    expect(sampler.sample()).toEqual({ fee: 5 });
    expect(sampler.sample()).toEqual({ fee: 5 });
  });

  it('should return zero fees for a zero range', () => {
    const sampler = new FeeSampler({ min: 0, max: 0 });
    expect(sampler.sample().fee).toBe(0);
  });

  it('should map the random source onto the inclusive range', () => {
    // span = 11
    const sampler = new FeeSampler({ min: 10, max: 20 }, sequence([0, 0.5, 0.999]));

    expect(sampler.sample().fee).toBe(10);
    expect(sampler.sample().fee).toBe(15);
    expect(sampler.sample().fee).toBe(20);
  });

  it('should clamp a random source that returns 1', () => {
    const sampler = new FeeSampler({ min: 10, max: 20 }, () => 1);
    expect(sampler.sample().fee).toBe(20);
  });

  it('should stay within bounds across many draws', () => {
    const sampler = new FeeSampler({ min: 3, max: 7 });
    const fees = Array.from({ length: 500 }, () => sampler.sample().fee);

    expect(Math.min(...fees)).toBeGreaterThanOrEqual(3);
    expect(Math.max(...fees)).toBeLessThanOrEqual(7);
    expect(fees.every(fee => Number.isInteger(fee))).toBe(true);
  });

  it('should return frozen samples', () => {
    const sampler = new FeeSampler({ min: 1, max: 2 });
    expect(Object.isFrozen(sampler.sample())).toBe(true);
  });

  it('should reject an inverted range', () => {
    expect(() => new FeeSampler({ min: 9, max: 3 })).toThrow(SpendValidationError);
    expect(() => new FeeSampler({ min: 9, max: 3 })).toThrow('Invalid fee range: fee min (9) cannot be greater than fee max (3)');
  });

  it('should reject a fractional bound', () => {
    expect(() => new FeeSampler({ min: 0.5, max: 3 })).toThrow(SpendValidationError);
  });

  it('should expose a copy of its range', () => {
    const sampler = new FeeSampler({ min: 2, max: 4 });
    expect(sampler.getRange()).toEqual({ min: 2, max: 4 });
  });
});

describe('feeRangeFromCommission', () => {
  it('should spread the commission by the change in both directions', () => {
    expect(feeRangeFromCommission(100, 20)).toEqual({ min: 80, max: 120 });
  });

  it('should floor the lower bound at zero', () => {
    expect(feeRangeFromCommission(5, 20)).toEqual({ min: 0, max: 25 });
  });

  it('should produce a fixed range with no change', () => {
    expect(feeRangeFromCommission(42, 0)).toEqual({ min: 42, max: 42 });
  });

  it('should reject negative inputs', () => {
    expect(() => feeRangeFromCommission(-1, 0)).toThrow('commission must be a non-negative integer (got -1)');
    expect(() => feeRangeFromCommission(10, -2)).toThrow('commission change must be a non-negative integer (got -2)');
  });
});
