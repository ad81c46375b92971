import { MismatchError } from './errors.js';

export const TOLERANCE_FACTOR = 32;

export interface CloseOptions {
  size: number;
  rtol?: number;
  atol?: number;
}

/**
 * Relative tolerance for a sum of `size` doubles. Rounding errors of independent additions
 * grow like sqrt(size), so the bound does too.
 */
export const relativeTolerance = (size: number) => TOLERANCE_FACTOR * Number.EPSILON * Math.sqrt(Math.max(size, 1));

export const tolerance = (a: number, b: number, { size, rtol = relativeTolerance(size), atol = 0 }: CloseOptions) => {
  return Math.max(atol, rtol * Math.max(Math.abs(a), Math.abs(b)));
};

export const isClose = (a: number, b: number, options: CloseOptions): boolean => {
  if (a === b) {
    return true;
  }
  if (!Number.isFinite(a) || !Number.isFinite(b)) {
    return false;
  }
  return Math.abs(a - b) <= tolerance(a, b, options);
};

export const verify = (label: string, actual: number, reference: number, size: number) => {
  if (!isClose(actual, reference, { size })) {
    throw new MismatchError(label, actual, reference, tolerance(actual, reference, { size }));
  }
};
