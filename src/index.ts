import { createExecutor, type ExecutorOptions, type VariantReport } from './executor.js';
import { createSample } from './sample.js';
import { ResultsTable, formatBestTime } from './table.js';
import { DEFAULT_COMPILER, DEFAULT_SIZE, type BenchmarkOptions, type ReportTypeList, type Variant } from './types.js';
import { VARIANTS, REFERENCE_VARIANT, referenceSum } from './variants.js';

export * from './types.js';
export * from './errors.js';
export { createSample } from './sample.js';
export { isClose, relativeTolerance, tolerance, verify, TOLERANCE_FACTOR } from './oracle.js';
export { run } from './runner.js';
export { Report, createReport, createStats, formatDuration, DEFAULT_STAT_TYPES } from './reporter.js';
export type { Stats, StatsReport } from './reporter.js';
export { ResultsTable, compareBestTime, formatBestTime, present, absent } from './table.js';
export { bindSymbol, compileLibrary, loadLibrary, libraryExtension, compilerFlags, C_SUM_SIGNATURE, C_SUM_SOURCE } from './native.js';
export type { NativeSignature, NativeFunction, NativeLibrary, NativeType, CompiledLibrary } from './native.js';
export { HostModuleRuntime, isCallable } from './runtime.js';
export type { ExternalRuntime, ForeignFunction, ForeignValue } from './runtime.js';
export { QuickJsRuntime } from './quickjs.js';
export { VARIANTS, REFERENCE_VARIANT, builtinSum, handSum, unrolledSum, referenceSum, selectVariants } from './variants.js';
export { createExecutor } from './executor.js';
export type { VariantReport, ExecutorOptions } from './executor.js';

export interface SessionOptions extends BenchmarkOptions {
  size?: number;
  compiler?: string;
  variants?: readonly Variant[];
  random?: () => number;
  reportTypes?: ReportTypeList;
  onReport?: (report: VariantReport, index: number) => void;
}

export interface SessionReport {
  size: number;
  reference: number;
  expected: number;
  reports: VariantReport[];
  table: ResultsTable;
  sorted: ResultsTable;
}

export class Session {
  #options: SessionOptions;
  #executed = false;

  constructor(options: SessionOptions = {}) {
    this.#options = options;
  }

  async execute(): Promise<SessionReport> {
    if (this.#executed) {
      throw new Error("Session is executed and can't be reused");
    }
    this.#executed = true;

    const { size = DEFAULT_SIZE, compiler = DEFAULT_COMPILER, variants = VARIANTS, random, onReport, ...benchmarkOptions } = this.#options;
    const executorOptions: ExecutorOptions = { compiler, ...benchmarkOptions };

    const sample = createSample(size, random);
    const reference = referenceSum(sample);
    const executor = createExecutor(executorOptions);

    const reports = new Array<VariantReport>(variants.length);
    const pending = variants.map((variant, index) =>
      executor.push<VariantReport>({ variant, sample, reference }).then((report) => {
        reports[index] = report;
        onReport?.(report, index);
      }),
    );
    await Promise.all(pending);
    executor.kill();

    const table = ResultsTable.build(reports);
    return { size, reference, expected: 0.5 * size, reports, table, sorted: table.sortByBestTime() };
  }
}

export const printSimpleReports = ({ table, sorted }: SessionReport) => {
  console.group('\nResults');
  console.log(table.render());
  console.groupEnd();
  console.group('\nSorted by best time');
  console.log(sorted.render());
  console.groupEnd();
};

export const printTableReports = ({ table, sorted }: SessionReport) => {
  console.log('\n', 'Results');
  console.table(table.toRecord());
  console.log('\n', 'Sorted by best time');
  console.table(sorted.toRecord());
};

export const printJSONReports = ({ size, reference, expected, reports, sorted }: SessionReport, padding?: number) => {
  const output = {
    size,
    reference,
    expected,
    reference_variant: REFERENCE_VARIANT,
    results: reports.map(({ id, label, best, value, stats }) => ({
      id,
      label,
      best: best.kind === 'present' ? best.value : null,
      display: formatBestTime(best),
      ...(best.kind === 'absent' ? { reason: best.reason } : {}),
      value,
      stats,
    })),
    sorted: sorted.rows.map(({ label }) => label),
  };
  console.log(JSON.stringify(output, null, padding));
};
