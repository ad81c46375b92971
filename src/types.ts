export type MaybePromise<T> = Promise<T> | PromiseLike<T> | T;

export interface SumFn {
  (array: Float64Array): number;
}

export interface VariantInstance {
  sum: SumFn;
  dispose?: () => MaybePromise<void>;
}

export interface VariantOptions {
  compiler: string;
}

export const VARIANT_IDS = ['c', 'quickjs-builtin', 'stdlib-dsum', 'quickjs-hand', 'js-builtin', 'js-hand', 'js-unrolled'] as const;
export type VariantId = (typeof VARIANT_IDS)[number];

export interface Variant {
  // built-in ids autocomplete; custom variants pick their own
  id: VariantId | (string & {});
  label: string;
  create(options: VariantOptions): Promise<VariantInstance>;
}

export type AbsentReason = 'unavailable' | 'mismatch' | 'failed';

export type BestTime = { kind: 'present'; value: number } | { kind: 'absent'; reason: AbsentReason };

export interface ResultRow {
  label: string;
  best: BestTime;
}

type _Sequence<To extends number, R extends unknown[]> = R['length'] extends To ? R[number] : _Sequence<To, [R['length'], ...R]>;
export type Sequence<To extends number> = number extends To ? number : _Sequence<To, []>;
export type Between<From extends number, To extends number> = Exclude<Sequence<To>, Sequence<From>>;

export type ReportType = 'ops' | 'min' | 'max' | 'mean' | 'median' | `p${Between<1, 100>}`;
export type ReportTypeList = readonly ReportType[];
export const REPORT_TYPES: ReportTypeList = Array.from({ length: 99 }, (_, idx) => `p${idx + 1}` as ReportType).concat(['ops', 'mean', 'min', 'max', 'median']);

export interface BenchmarkOptions {
  warmupCycles?: number;
  minCycles?: number;
  maxCycles?: number;
  budget?: number; // ms
}

export interface RunOptions extends BenchmarkOptions {
  now?: () => bigint;
}

export interface BenchmarkResult {
  times: number[]; // ns, trial order
  best: number;
}

export const DEFAULT_SIZE = 10_000_000;
export const DEFAULT_WARMUP_CYCLES = 1;
export const DEFAULT_MIN_CYCLES = 1;
export const DEFAULT_CYCLES = 100;
export const DEFAULT_BUDGET = 5_000;
export const DEFAULT_COMPILER = 'cc';
