import { transformSync } from '@swc/core';

export const cmp = (a: bigint | number, b: bigint | number): number => {
  if (a > b) {
    return 1;
  }
  if (a < b) {
    return -1;
  }
  return 0;
};

export const min = (values: readonly number[]) => {
  let result = Number.POSITIVE_INFINITY;
  for (const value of values) {
    if (value < result) {
      result = value;
    }
  }
  return result;
};

export const formatError = (e: unknown) => (e && typeof e === 'object' && 'stack' in e ? e.stack : e);

export const isNonNegativeInteger = (value: number) => Number.isSafeInteger(value) && value >= 0;

// inline sources are evaluated as scripts, so top-level function declarations land on the global object
export const transpile = (code: string): string => {
  const output = transformSync(code, {
    filename: 'inline.ts',
    isModule: false,
    jsc: {
      parser: {
        syntax: 'typescript',
        tsx: false,
      },
      target: 'es2020',
    },
  });
  return output.code;
};
