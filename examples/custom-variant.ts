// Adds a variant of your own next to the built-in ones and prints the JSON report

import { Session, VARIANTS, printJSONReports, type Variant } from '../src/index.js';

// pairwise summation: more accurate than a running sum, with the same number of additions
const pairwise = (array: Float64Array, from = 0, to = array.length): number => {
  if (to - from <= 8) {
    let s = 0.0;
    for (let i = from; i < to; i++) {
      s += array[i];
    }
    return s;
  }
  const mid = from + ((to - from) >> 1);
  return pairwise(array, from, mid) + pairwise(array, mid, to);
};

const variants: Variant[] = [
  ...VARIANTS.filter(({ id }) => id.startsWith('js-')),
  { id: 'js-pairwise', label: 'JavaScript - pairwise', create: async () => ({ sum: (array) => pairwise(array) }) },
];

const report = await new Session({ size: 2_000_000, variants }).execute();

printJSONReports(report, 2);
