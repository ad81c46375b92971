import { isNonNegativeInteger } from './utils.js';

/**
 * Allocates `size` doubles drawn from `random`, uniform on [0, 1) by default.
 * The array is shared by every variant and must not be written to afterwards.
 */
export const createSample = (size: number, random: () => number = Math.random): Float64Array => {
  if (!isNonNegativeInteger(size)) {
    throw new RangeError(`Sample size must be a non-negative integer, got ${size}`);
  }
  const sample = new Float64Array(size);
  for (let i = 0; i < size; i++) {
    sample[i] = random();
  }
  return sample;
};
