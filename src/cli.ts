#!/usr/bin/env node
import { createRequire } from 'node:module';
import { Command, InvalidArgumentError, Option } from 'commander';
import { Session, printTableReports, printJSONReports, printSimpleReports, type SessionReport } from './index.js';
import { DEFAULT_STAT_TYPES } from './reporter.js';
import { formatBestTime } from './table.js';
import {
  DEFAULT_BUDGET,
  DEFAULT_COMPILER,
  DEFAULT_CYCLES,
  DEFAULT_MIN_CYCLES,
  DEFAULT_SIZE,
  DEFAULT_WARMUP_CYCLES,
  REPORT_TYPES,
  VARIANT_IDS,
  type ReportType,
  type VariantId,
} from './types.js';
import { selectVariants } from './variants.js';

const require = createRequire(import.meta.url);
const { name, description, version } = require('../package.json');

const FORMATS = ['simple', 'json', 'pjson', 'table'] as const;
type Format = (typeof FORMATS)[number];

interface CliOptions {
  size: number;
  budget: number;
  warmupCycles: number;
  minCycles: number;
  maxCycles: number;
  variants: VariantId[];
  reportTypes: ReportType[];
  format: Format;
  cc: string;
}

const parseInteger = (value: string) => {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}".`);
  }
  return parsed;
};

const print = (format: Format, report: SessionReport) => {
  switch (format) {
    case 'json':
      {
        printJSONReports(report);
      }
      break;
    case 'pjson':
      {
        printJSONReports(report, 2);
      }
      break;
    case 'table':
      {
        printTableReports(report);
      }
      break;
    default:
      printSimpleReports(report);
  }
};

const commander = new Command();

commander
  .name(name)
  .description(description)
  .version(version)
  .addOption(new Option('-n, --size <size>', 'number of uniform [0, 1) samples to sum').default(DEFAULT_SIZE).argParser(parseInteger))
  .addOption(new Option('-b, --budget <budget>', 'time budget per variant in milliseconds').default(DEFAULT_BUDGET).argParser(parseInteger))
  .addOption(new Option('--warmup-cycles <warmupCycles>', 'untimed calls before measuring').default(DEFAULT_WARMUP_CYCLES).argParser(parseInteger))
  .addOption(new Option('--min-cycles <minCycles>', 'minimum timed calls per variant').default(DEFAULT_MIN_CYCLES).argParser(parseInteger))
  .addOption(new Option('--max-cycles <maxCycles>', 'maximum timed calls per variant').default(DEFAULT_CYCLES).argParser(parseInteger))
  .addOption(new Option('-v, --variants <variants...>', 'variants to run, in declaration order').choices(VARIANT_IDS).default([]))
  .addOption(new Option('-r, --report-types <reportTypes...>', 'statistic types to include in the JSON report').choices(REPORT_TYPES).default(DEFAULT_STAT_TYPES))
  .addOption(new Option('-f, --format <format>', 'output format').default('simple').choices(FORMATS))
  .addOption(new Option('--cc <cc>', 'C compiler used for the native variant').default(process.env.CC ?? DEFAULT_COMPILER))
  .action(async ({ size, budget, warmupCycles, minCycles, maxCycles, variants, reportTypes, format, cc }: CliOptions) => {
    const simple = format === 'simple';
    const session = new Session({
      size,
      budget,
      warmupCycles,
      minCycles,
      maxCycles,
      compiler: cc,
      variants: selectVariants(variants),
      reportTypes,
      onReport: simple ? ({ label, best }) => console.log(`${label}: ${formatBestTime(best)}`) : undefined,
    });

    if (simple) {
      console.log(`summing ${size.toLocaleString('en-US')} samples, expecting about ${(0.5 * size).toLocaleString('en-US')}`);
    }
    const report = await session.execute();
    if (simple) {
      console.log(`reference sum: ${report.reference}`);
    }

    print(format, report);

    if (report.reports.some(({ best }) => best.kind === 'absent' && best.reason === 'mismatch')) {
      process.exitCode = 1;
    }
  });

commander.parseAsync(process.argv).catch((e: unknown) => {
  console.error(e instanceof Error ? e.stack : e);
  process.exitCode = 1;
});
