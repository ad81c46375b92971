import { describe, it, expect, vi } from 'vitest';
import { spawnSync } from 'node:child_process';
import { existsSync } from 'node:fs';
import {
  bindSymbol,
  compileLibrary,
  compilerFlags,
  formatPrototype,
  libraryExtension,
  loadLibrary,
  validateSignature,
  C_SUM_SIGNATURE,
  C_SUM_SOURCE,
  type NativeLibrary,
} from '../native.js';
import { CompileError, SignatureError } from '../errors.js';

const hasCompiler = spawnSync('cc', ['--version']).status === 0;

const fakeLibrary = (result: unknown) => {
  const native = vi.fn(() => result);
  const library: NativeLibrary = {
    path: 'fake',
    func: vi.fn(() => native),
    unload: vi.fn(),
  };
  return { library, native };
};

describe('platform details', () => {
  it('names shared libraries per platform', () => {
    expect(libraryExtension('linux')).toBe('so');
    expect(libraryExtension('darwin')).toBe('dylib');
    expect(libraryExtension('win32')).toBe('dll');
  });

  it('adds the SSE3 flag only on x64', () => {
    expect(compilerFlags('x64')).toEqual(['-fPIC', '-O3', '-msse3', '-xc', '-shared']);
    expect(compilerFlags('arm64')).toEqual(['-fPIC', '-O3', '-xc', '-shared']);
  });
});

describe('signatures', () => {
  it('formats the C prototype', () => {
    expect(formatPrototype(C_SUM_SIGNATURE)).toBe('double c_sum(size_t arg0, const double *arg1)');
  });

  it('rejects invalid names and result types', () => {
    expect(() => validateSignature({ name: 'c-sum', result: 'double', parameters: [] })).toThrow(SignatureError);
    expect(() => validateSignature({ name: 'c_sum', result: 'const double *', parameters: [] })).toThrow(SignatureError);
    expect(() => validateSignature(C_SUM_SIGNATURE)).not.toThrow();
  });
});

describe('bindSymbol', () => {
  it('binds once with the declared prototype', () => {
    const { library, native } = fakeLibrary(42);
    const cSum = bindSymbol(library, C_SUM_SIGNATURE);
    const array = new Float64Array([1, 2]);

    expect(library.func).toHaveBeenCalledOnce();
    expect(library.func).toHaveBeenCalledWith('double c_sum(size_t arg0, const double *arg1)');
    expect(cSum(2, array)).toBe(42);
    expect(native).toHaveBeenCalledWith(2, array);
    expect(cSum.signature).toBe(C_SUM_SIGNATURE);
  });

  it('rejects calls that do not match the signature before crossing into native code', () => {
    const { library, native } = fakeLibrary(0);
    const cSum = bindSymbol(library, C_SUM_SIGNATURE);
    const array = new Float64Array(1);

    expect(() => cSum(1)).toThrow(TypeError);
    expect(() => cSum(-1, array)).toThrow(TypeError);
    expect(() => cSum(1.5, array)).toThrow(TypeError);
    expect(() => cSum(array, 1)).toThrow(TypeError);
    expect(native).not.toHaveBeenCalled();
  });
});

describe('compileLibrary', () => {
  it('reports a missing compiler', () => {
    expect(() => compileLibrary(C_SUM_SOURCE, { compiler: 'sumrace-no-such-compiler' })).toThrow(CompileError);
  });

  it.skipIf(hasCompiler)('reports cc as missing on hosts without it', () => {
    expect(() => compileLibrary(C_SUM_SOURCE, { compiler: 'cc' })).toThrow(CompileError);
  });

  it.skipIf(!hasCompiler)('reports compiler errors with their output', () => {
    expect(() => compileLibrary('double broken(', { compiler: 'cc' })).toThrow(CompileError);
  });

  it.skipIf(!hasCompiler)('builds a library that sums through the foreign call', () => {
    const compiled = compileLibrary(C_SUM_SOURCE, { compiler: 'cc' });
    expect(compiled.path.endsWith(`.${libraryExtension()}`)).toBe(true);

    const library = loadLibrary(compiled.path);
    try {
      const cSum = bindSymbol(library, C_SUM_SIGNATURE);
      expect(cSum(3, new Float64Array([1, 1, 1]))).toBe(3);
      expect(cSum(2, new Float64Array([0.5, 0.25, 100]))).toBe(0.75);
    } finally {
      library.unload();
      compiled.dispose();
    }
    expect(existsSync(compiled.path)).toBe(false);
  });
});
