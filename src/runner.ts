import { DEFAULT_BUDGET, DEFAULT_CYCLES, DEFAULT_MIN_CYCLES, DEFAULT_WARMUP_CYCLES, type RunOptions, type BenchmarkResult } from './types.js';
import { isNonNegativeInteger, min } from './utils.js';

const hr = process.hrtime.bigint.bind(process.hrtime);

const NS_PER_MS = 1_000_000;

// results are written here so the measured call is never dead code
export let blackhole: unknown;

const validate = ({ warmupCycles, minCycles, maxCycles, budget }: Required<Omit<RunOptions, 'now'>>) => {
  if (!isNonNegativeInteger(warmupCycles)) {
    throw new RangeError(`warmupCycles must be a non-negative integer, got ${warmupCycles}`);
  }
  if (!isNonNegativeInteger(minCycles) || minCycles < 1) {
    throw new RangeError(`minCycles must be a positive integer, got ${minCycles}`);
  }
  if (!isNonNegativeInteger(maxCycles) || maxCycles < minCycles) {
    throw new RangeError(`maxCycles must be an integer not less than minCycles (${minCycles}), got ${maxCycles}`);
  }
  if (!Number.isFinite(budget) || budget <= 0) {
    throw new RangeError(`budget must be a positive number of milliseconds, got ${budget}`);
  }
};

/**
 * Times `fn(...args)` one call per trial.
 *
 * Untimed warmup calls run first so one-time costs (tiering, lazy compilation, first-touch page faults)
 * stay out of the samples. Trials continue until `maxCycles` is reached or, once `minCycles` trials are in,
 * the time spent since the first trial passes `budget` milliseconds.
 */
export const run = <TArgs extends unknown[]>(fn: (...args: TArgs) => unknown, args: TArgs, options: RunOptions = {}): BenchmarkResult => {
  const {
    warmupCycles = DEFAULT_WARMUP_CYCLES,
    minCycles = DEFAULT_MIN_CYCLES,
    maxCycles = Math.max(DEFAULT_CYCLES, minCycles),
    budget = DEFAULT_BUDGET,
    now = hr,
  } = options;
  validate({ warmupCycles, minCycles, maxCycles, budget });

  for (let i = 0; i < warmupCycles; i++) {
    blackhole = fn(...args);
  }

  const budgetNs = BigInt(Math.ceil(budget * NS_PER_MS));
  const times: number[] = [];
  const started = now();

  while (times.length < maxCycles) {
    const start = now();
    blackhole = fn(...args);
    const end = now();
    times.push(Number(end - start));

    if (times.length >= minCycles && end - started >= budgetNs) {
      break;
    }
  }

  return { times, best: min(times) };
};
