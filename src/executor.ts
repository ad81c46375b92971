import { queue } from 'async';
import { MismatchError } from './errors.js';
import { verify } from './oracle.js';
import { createStats, DEFAULT_STAT_TYPES, type Stats } from './reporter.js';
import { run } from './runner.js';
import { absent, present } from './table.js';
import type { BenchmarkOptions, BestTime, ReportTypeList, Variant, VariantInstance } from './types.js';
import { formatError } from './utils.js';

export interface VariantReport {
  id: Variant['id'];
  label: string;
  best: BestTime;
  value?: number;
  stats?: Stats;
}

export interface ExecutorOptions extends BenchmarkOptions {
  compiler: string;
  reportTypes?: ReportTypeList;
}

export interface ExecutorTask {
  variant: Variant;
  sample: Float64Array;
  reference: number;
}

const message = (e: unknown) => (e instanceof Error ? e.message : String(e));

const dispose = async ({ label }: Variant, instance: VariantInstance) => {
  try {
    await instance.dispose?.();
  } catch (e) {
    console.error(`${label}: cleanup failed`);
    console.error(formatError(e));
  }
};

/** Builds, checks and measures one variant at a time; no two trials overlap. */
export const createExecutor = ({ compiler, reportTypes = DEFAULT_STAT_TYPES, ...benchmarkOptions }: ExecutorOptions) => {
  const executor = queue<ExecutorTask>(async ({ variant, sample, reference }): Promise<VariantReport> => {
    const { id, label } = variant;

    let instance: VariantInstance;
    try {
      instance = await variant.create({ compiler });
    } catch (e) {
      console.error(`${label} is unavailable: ${message(e)}`);
      return { id, label, best: absent('unavailable') };
    }

    try {
      const value = instance.sum(sample);
      verify(label, value, reference, sample.length);
      const { times, best } = run(instance.sum, [sample], benchmarkOptions);
      return { id, label, best: present(best), value, stats: createStats(times, reportTypes) };
    } catch (e) {
      if (e instanceof MismatchError) {
        console.error(e.message);
        return { id, label, best: absent('mismatch'), value: e.actual };
      }
      console.error(formatError(e));
      return { id, label, best: absent('failed') };
    } finally {
      await dispose(variant, instance);
    }
  }, 1);

  executor.error((err) => {
    console.error(err);
  });

  return executor;
};
