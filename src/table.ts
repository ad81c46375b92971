import { formatDuration } from './reporter.js';
import type { BestTime, ResultRow } from './types.js';

export const present = (value: number): BestTime => ({ kind: 'present', value });
export const absent = (reason: Extract<BestTime, { kind: 'absent' }>['reason']): BestTime => ({ kind: 'absent', reason });

/** Present times ascending, every absent entry after every present one. */
export const compareBestTime = (a: BestTime, b: BestTime): number => {
  if (a.kind === 'absent') {
    return b.kind === 'absent' ? 0 : 1;
  }
  if (b.kind === 'absent') {
    return -1;
  }
  return a.value - b.value;
};

export const formatBestTime = (best: BestTime) => (best.kind === 'present' ? formatDuration(best.value) : `n/a (${best.reason})`);

const HEADERS = ['Method', 'Best time'] as const;

export class ResultsTable {
  readonly #rows: readonly ResultRow[];

  static build(rows: Iterable<ResultRow>): ResultsTable {
    return new ResultsTable(rows);
  }

  private constructor(rows: Iterable<ResultRow>) {
    this.#rows = Object.freeze(Array.from(rows, ({ label, best }) => ({ label, best })));
  }

  get rows(): readonly ResultRow[] {
    return this.#rows;
  }

  get size() {
    return this.#rows.length;
  }

  head(count: number): ResultsTable {
    return new ResultsTable(this.#rows.slice(0, Math.max(0, count)));
  }

  // Array.prototype.sort is stable, so equal times keep their insertion order
  sortByBestTime(): ResultsTable {
    return new ResultsTable([...this.#rows].sort((a, b) => compareBestTime(a.best, b.best)));
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.#rows.map(({ label, best }) => [label, formatBestTime(best)]));
  }

  render(): string {
    const cells = this.#rows.map(({ label, best }) => [label, formatBestTime(best)] as const);
    const widths = HEADERS.map((header, column) => Math.max(header.length, ...cells.map((row) => row[column].length)));
    const line = (values: readonly string[]) => values.map((value, column) => value.padEnd(widths[column])).join(' | ').trimEnd();
    const separator = widths.map((width) => '-'.repeat(width)).join('-|-');
    return [line(HEADERS), separator, ...cells.map(line)].join('\n');
  }

  toString() {
    return this.render();
  }
}
