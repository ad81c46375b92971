import { bindSymbol, compileLibrary, loadLibrary, C_SUM_SIGNATURE, C_SUM_SOURCE } from './native.js';
import { QuickJsRuntime } from './quickjs.js';
import { HostModuleRuntime, type ExternalRuntime } from './runtime.js';
import type { SumFn, Variant, VariantId, VariantInstance } from './types.js';

export const DSUM_MODULE = '@stdlib/blas-ext-base-dsum';

export const QUICKJS_BUILTIN_SOURCE = `
function builtinSum(a: Float64Array): number {
  return a.reduce((s, x) => s + x, 0);
}
`;

export const QUICKJS_HAND_SOURCE = `
function handSum(a: Float64Array): number {
  let s = 0.0;
  for (let i = 0; i < a.length; i++) {
    s = s + a[i];
  }
  return s;
}
`;

const toNumber = (label: string, value: unknown): number => {
  if (typeof value !== 'number') {
    throw new TypeError(`${label} returned ${typeof value} instead of a number`);
  }
  return value;
};

export const builtinSum: SumFn = (array) => array.reduce((s, x) => s + x, 0);

export const handSum: SumFn = (array) => {
  let s = 0.0;
  for (const x of array) {
    s += x;
  }
  return s;
};

/**
 * Four independent accumulators so consecutive additions do not wait on each other. The order of
 * additions differs from `handSum`, so the last bits of the result may too.
 */
export const unrolledSum: SumFn = (array) => {
  const n = array.length;
  const tail = n - (n % 4);
  let s0 = 0.0;
  let s1 = 0.0;
  let s2 = 0.0;
  let s3 = 0.0;
  for (let i = 0; i < tail; i += 4) {
    s0 += array[i];
    s1 += array[i + 1];
    s2 += array[i + 2];
    s3 += array[i + 3];
  }
  for (let i = tail; i < n; i++) {
    if (i % 4 === 0) s0 += array[i];
    else if (i % 4 === 1) s1 += array[i];
    else s2 += array[i];
  }
  return s0 + s1 + (s2 + s3);
};

const inRuntime = async <T extends ExternalRuntime>(runtime: T, label: string, bind: (runtime: T) => (array: Float64Array) => unknown): Promise<VariantInstance> => {
  try {
    const fn = bind(runtime);
    return {
      sum: (array) => toNumber(label, fn(array)),
      dispose: () => runtime.dispose(),
    };
  } catch (e) {
    runtime.dispose();
    throw e;
  }
};

const host = (sum: SumFn) => async (): Promise<VariantInstance> => ({ sum });

export const VARIANTS: readonly Variant[] = [
  {
    id: 'c',
    label: 'C',
    async create({ compiler }) {
      const compiled = compileLibrary(C_SUM_SOURCE, { compiler });
      try {
        const library = loadLibrary(compiled.path);
        try {
          const cSum = bindSymbol(library, C_SUM_SIGNATURE);
          return {
            sum: (array) => toNumber('C', cSum(array.length, array)),
            dispose: () => {
              library.unload();
              compiled.dispose();
            },
          };
        } catch (e) {
          library.unload();
          throw e;
        }
      } catch (e) {
        compiled.dispose();
        throw e;
      }
    },
  },
  {
    id: 'quickjs-builtin',
    label: 'QuickJS - built-in',
    async create() {
      return inRuntime(await QuickJsRuntime.create(), 'QuickJS - built-in', (runtime) => runtime.defineInline(QUICKJS_BUILTIN_SOURCE, 'builtinSum'));
    },
  },
  {
    id: 'stdlib-dsum',
    label: 'stdlib - dsum',
    async create() {
      return inRuntime(await HostModuleRuntime.create([DSUM_MODULE]), 'stdlib - dsum', (runtime) => {
        const dsum = runtime.getCallable(DSUM_MODULE);
        return (array: Float64Array) => dsum(array.length, array, 1);
      });
    },
  },
  {
    id: 'quickjs-hand',
    label: 'QuickJS - hand-written',
    async create() {
      return inRuntime(await QuickJsRuntime.create(), 'QuickJS - hand-written', (runtime) => runtime.defineInline(QUICKJS_HAND_SOURCE, 'handSum'));
    },
  },
  {
    id: 'js-builtin',
    label: 'JavaScript - built-in',
    create: host(builtinSum),
  },
  {
    id: 'js-hand',
    label: 'JavaScript - hand-written',
    create: host(handSum),
  },
  {
    id: 'js-unrolled',
    label: 'JavaScript - hand-written unrolled',
    create: host(unrolledSum),
  },
];

export const REFERENCE_VARIANT: VariantId = 'js-builtin';

export const referenceSum: SumFn = builtinSum;

export const selectVariants = (ids?: readonly VariantId[]): Variant[] => {
  if (!ids || ids.length === 0) {
    return [...VARIANTS];
  }
  return VARIANTS.filter((variant) => ids.some((id) => id === variant.id));
};
