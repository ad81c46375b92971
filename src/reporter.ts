import { cmp } from './utils.js';
import type { ReportType, ReportTypeList } from './types.js';

const units = [
  { unit: 'ns', factor: 1 },
  { unit: 'µs', factor: 1e3 },
  { unit: 'ms', factor: 1e6 },
  { unit: 's', factor: 1e9 },
] as const;

const NS_PER_SEC = 1e9;

function smartFixed(n: number): string {
  return n.toLocaleString('en-US', {
    minimumFractionDigits: 0,
    maximumFractionDigits: 2,
    useGrouping: true,
  });
}

export const formatDuration = (ns: number): string => {
  for (const { unit, factor } of units) {
    const candidate = ns / factor;
    if (candidate < 1000 || unit === 's') {
      return `${smartFixed(candidate)} ${unit}`;
    }
  }
  return `${smartFixed(ns)} ns`;
};

export class Report {
  constructor(
    public readonly type: ReportType,
    public readonly value: number,
  ) {}
  valueOf() {
    return this.value;
  }
  toString() {
    if (this.type === 'ops') {
      return `${smartFixed(this.value)} ops/s`;
    }
    return formatDuration(this.value);
  }
  toJSON() {
    return this.value;
  }
}

export type StatsReport<R extends ReportTypeList> = Record<R[number], Report> & { count: number };
export type Stats = Partial<Record<ReportType, Report>> & { count: number };

export const DEFAULT_STAT_TYPES = ['min', 'median', 'mean', 'max'] as const satisfies ReportTypeList;

/** `durations` must be sorted ascending. */
export const createReport = (durations: readonly number[], type: ReportType): Report => {
  const n = durations.length;
  if (n === 0) {
    return new Report(type, 0);
  }
  switch (type) {
    case 'min': {
      return new Report(type, durations[0]);
    }
    case 'max': {
      return new Report(type, durations[n - 1]);
    }
    case 'median': {
      const mid = Math.floor(n / 2);
      const med = n % 2 === 0 ? (durations[mid - 1] + durations[mid]) / 2 : durations[mid];
      return new Report(type, med);
    }
    case 'mean': {
      let sum = 0;
      for (const duration of durations) {
        sum += duration;
      }
      return new Report(type, sum / n);
    }
    case 'ops': {
      let sum = 0;
      for (const duration of durations) {
        sum += duration;
      }
      const avgNs = sum / n;
      return new Report(type, avgNs > 0 ? NS_PER_SEC / avgNs : 0);
    }
    default: {
      const p = Number(type.slice(1));
      const idx = Math.ceil((p / 100) * n) - 1;
      return new Report(type, durations[Math.min(Math.max(idx, 0), n - 1)]);
    }
  }
};

export const createStats = <R extends ReportTypeList>(times: readonly number[], reportTypes: R): StatsReport<R> => {
  const durations = [...times].sort(cmp);
  const entries = reportTypes.map<[string, Report | number]>((type) => [type, createReport(durations, type)]).concat([['count', durations.length]]);
  return Object.fromEntries(entries) as StatsReport<R>;
};
