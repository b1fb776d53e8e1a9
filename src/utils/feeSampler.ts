import { FeeRange, FeeSample, SpendValidationError } from '../types/SpendTypes';
import { feeRangeErrors } from './spendLedger';

/**
 * Draws per-transaction fees uniformly from a closed integer range.
 * Holds no mutable state, so each worker can own one without coordination.
 */
export class FeeSampler {
  private readonly min: number;
  private readonly max: number;

  constructor(
    range: FeeRange,
    private readonly random: () => number = Math.random
  ) {
    const errors = feeRangeErrors(range.min, range.max);
    if (errors.length > 0) {
      throw new SpendValidationError(`Invalid fee range: ${errors.join('; ')}`);
    }
    this.min = range.min;
    this.max = range.max;
  }

  sample(): FeeSample {
    if (this.min === this.max) {
      return Object.freeze({ fee: this.min });
    }
    const span = this.max - this.min + 1;
    // custom sources may return 1
    const offset = Math.min(Math.floor(this.random() * span), span - 1);
    return Object.freeze({ fee: this.min + offset });
  }

  getRange(): FeeRange {
    return { min: this.min, max: this.max };
  }
}

/**
 * Build a fee range from a base commission varied by +/- change, floored at zero.
 */
export function feeRangeFromCommission(commission: number, change: number): FeeRange {
  if (!Number.isSafeInteger(commission) || commission < 0) {
    throw new SpendValidationError(`commission must be a non-negative integer (got ${commission})`);
  }
  if (!Number.isSafeInteger(change) || change < 0) {
    throw new SpendValidationError(`commission change must be a non-negative integer (got ${change})`);
  }
  return {
    min: Math.max(0, commission - change),
    max: commission + change,
  };
}

export default FeeSampler;
