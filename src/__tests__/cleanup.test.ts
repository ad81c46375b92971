import { describe, it, expect, vi } from 'vitest';
import { QuickJsRuntime } from '../quickjs.js';
import { VARIANTS } from '../variants.js';

const mocks = vi.hoisted(() => ({
  removeDirectory: vi.fn(),
  unload: vi.fn(),
  disposeContext: vi.fn(),
}));

vi.mock('../native.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../native.js')>();
  return {
    ...actual,
    compileLibrary: () => ({ path: 'libsumrace.so', dispose: mocks.removeDirectory }),
    loadLibrary: (path: string) => ({ path, func: () => () => 0, unload: mocks.unload }),
    bindSymbol: () => {
      throw new TypeError('c_sum is not exported');
    },
  };
});

vi.mock('quickjs-emscripten', () => ({
  getQuickJS: async () => ({
    newContext: () => ({
      evalCode: () => {
        throw new Error('out of memory');
      },
      dispose: mocks.disposeContext,
    }),
  }),
}));

describe('construction failures', () => {
  it('unloads the library and removes the build directory when binding fails', async () => {
    const c = VARIANTS.find(({ id }) => id === 'c');

    await expect(c?.create({ compiler: 'cc' })).rejects.toThrow('c_sum is not exported');
    expect(mocks.unload).toHaveBeenCalledOnce();
    expect(mocks.removeDirectory).toHaveBeenCalledOnce();
  });

  it('disposes the interpreter context when setting it up fails', async () => {
    await expect(QuickJsRuntime.create()).rejects.toThrow('out of memory');
    expect(mocks.disposeContext).toHaveBeenCalledOnce();
  });
});
