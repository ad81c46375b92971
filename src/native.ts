import { spawnSync } from 'node:child_process';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import koffi from 'koffi';
import { CompileError, SignatureError } from './errors.js';
import { formatError } from './utils.js';

export const NATIVE_TYPES = ['double', 'size_t', 'const double *'] as const;
export type NativeType = (typeof NATIVE_TYPES)[number];
export type NativeValue = number | Float64Array;

export interface NativeSignature {
  name: string;
  result: NativeType;
  parameters: readonly NativeType[];
}

export interface NativeFunction {
  (...args: NativeValue[]): unknown;
  readonly signature: NativeSignature;
}

export interface NativeLibrary {
  readonly path: string;
  func(prototype: string): (...args: NativeValue[]) => unknown;
  unload(): void;
}

export interface CompiledLibrary {
  readonly path: string;
  dispose(): void;
}

export interface CompileOptions {
  compiler: string;
  arch?: NodeJS.Architecture;
  platform?: NodeJS.Platform;
  directory?: string;
}

export const C_SUM_SIGNATURE = {
  name: 'c_sum',
  result: 'double',
  parameters: ['size_t', 'const double *'],
} as const satisfies NativeSignature;

export const C_SUM_SOURCE = `
#include <stddef.h>

double c_sum(size_t n, const double *X) {
    double s = 0.0;
    for (size_t i = 0; i < n; ++i) {
        s += X[i];
    }
    return s;
}
`;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const libraryExtension = (platform: NodeJS.Platform = process.platform) => {
  switch (platform) {
    case 'win32':
      return 'dll';
    case 'darwin':
      return 'dylib';
    default:
      return 'so';
  }
};

export const compilerFlags = (arch: NodeJS.Architecture = process.arch) => ['-fPIC', '-O3', ...(arch === 'x64' ? ['-msse3'] : []), '-xc', '-shared'];

/** Compiles C `source` (fed on stdin) into a shared library inside a fresh temporary directory. */
export const compileLibrary = (source: string, { compiler, arch, platform, directory = tmpdir() }: CompileOptions): CompiledLibrary => {
  const dir = mkdtempSync(join(directory, 'sumrace-'));
  const path = join(dir, `sumrace.${libraryExtension(platform)}`);
  const dispose = () => {
    try {
      rmSync(dir, { recursive: true, force: true });
    } catch (e) {
      console.error(formatError(e));
    }
  };

  const result = spawnSync(compiler, [...compilerFlags(arch), '-o', path, '-'], { input: source, encoding: 'utf8' });
  if (result.error) {
    dispose();
    throw new CompileError(`Unable to run compiler "${compiler}": ${result.error.message}`);
  }
  if (result.status !== 0) {
    dispose();
    throw new CompileError(`Compiler "${compiler}" exited with ${result.status ?? result.signal}`, result.stderr.trim());
  }

  return { path, dispose };
};

export const loadLibrary = (path: string): NativeLibrary => {
  const lib = koffi.load(path);
  return {
    path,
    func: (prototype) => lib.func(prototype),
    unload: () => lib.unload(),
  };
};

const isNativeType = (value: unknown): value is NativeType => NATIVE_TYPES.some((type) => type === value);

export const validateSignature = ({ name, result, parameters }: NativeSignature) => {
  if (!IDENTIFIER.test(name)) {
    throw new SignatureError(`Invalid symbol name "${name}"`);
  }
  if (!isNativeType(result) || result === 'const double *') {
    throw new SignatureError(`Unsupported result type "${result}" for ${name}`);
  }
  parameters.forEach((type, idx) => {
    if (!isNativeType(type)) {
      throw new SignatureError(`Unsupported type "${type}" for parameter ${idx} of ${name}`);
    }
  });
};

export const formatPrototype = ({ name, result, parameters }: NativeSignature) => {
  const params = parameters.map((type, idx) => `${type}${type.endsWith('*') ? '' : ' '}arg${idx}`);
  return `${result} ${name}(${params.join(', ')})`;
};

const matches = (type: NativeType, value: NativeValue) => {
  switch (type) {
    case 'const double *':
      return value instanceof Float64Array;
    case 'size_t':
      return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
    default:
      return typeof value === 'number';
  }
};

/**
 * Binds `signature.name` from `library`. The signature is checked here, once; calls with the wrong arity
 * or argument kinds are rejected before they reach the native boundary.
 */
export const bindSymbol = (library: NativeLibrary, signature: NativeSignature): NativeFunction => {
  validateSignature(signature);
  const native = library.func(formatPrototype(signature));
  const { name, parameters } = signature;

  return Object.assign(
    (...args: NativeValue[]) => {
      if (args.length !== parameters.length || !parameters.every((type, idx) => matches(type, args[idx]))) {
        throw new TypeError(`${name} expects (${parameters.join(', ')})`);
      }
      return native(...args);
    },
    { signature },
  );
};
