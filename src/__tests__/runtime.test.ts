import { describe, it, expect } from 'vitest';
import { HostModuleRuntime, isCallable } from '../runtime.js';
import { UnavailableError } from '../errors.js';
import { DSUM_MODULE } from '../variants.js';

describe('HostModuleRuntime', () => {
  it('resolves a module default export as a callable', async () => {
    const runtime = await HostModuleRuntime.create([DSUM_MODULE]);
    const dsum = runtime.getCallable(DSUM_MODULE);
    expect(dsum(3, new Float64Array([1, 2, 3]), 1)).toBe(6);
    expect(dsum(2, new Float64Array([1, 2, 3, 4]), 2)).toBe(4);
    runtime.dispose();
  });

  it('resolves named exports', async () => {
    const runtime = await HostModuleRuntime.create(['node:path']);
    const basename = runtime.getCallable('node:path#basename');
    expect(isCallable(basename)).toBe(true);
    expect(() => runtime.getCallable('node:path#sep')).toThrow(TypeError);
    runtime.dispose();
  });

  it('reports modules that cannot be loaded as unavailable', async () => {
    await expect(HostModuleRuntime.create(['sumrace-missing-module'])).rejects.toBeInstanceOf(UnavailableError);
  });

  it('refuses callables from modules it did not load', async () => {
    const runtime = await HostModuleRuntime.create();
    expect(() => runtime.getCallable(DSUM_MODULE)).toThrow(UnavailableError);
  });

  it('defines functions from inline TypeScript', async () => {
    const runtime = await HostModuleRuntime.create();
    const twice = runtime.defineInline('function twice(x: number): number { return 2 * x; }', 'twice');
    expect(twice(4)).toBe(8);

    const total = runtime.defineInline(
      `function total(a: Float64Array): number {
        let s = 0;
        for (const x of a) s += x;
        return s;
      }`,
      'total',
    );
    expect(total(new Float64Array([0.5, 0.25]))).toBe(0.75);
  });

  it('rejects inline source that does not define the function', async () => {
    const runtime = await HostModuleRuntime.create();
    expect(() => runtime.defineInline('const value: number = 1;', 'value')).toThrow(TypeError);
  });
});
