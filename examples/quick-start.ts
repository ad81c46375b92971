// Host-only comparison, no compiler or interpreter needed

import { Session, printSimpleReports, selectVariants } from '../src/index.js';

const report = await new Session({
  size: 1_000_000,
  budget: 1_000,
  variants: selectVariants(['js-builtin', 'js-hand', 'js-unrolled']),
}).execute();

printSimpleReports(report);
