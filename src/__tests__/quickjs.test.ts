import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { QuickJsRuntime } from '../quickjs.js';
import { QUICKJS_BUILTIN_SOURCE, QUICKJS_HAND_SOURCE } from '../variants.js';

describe('QuickJsRuntime', () => {
  let runtime: QuickJsRuntime;

  beforeEach(async () => {
    runtime = await QuickJsRuntime.create();
  });

  afterEach(() => {
    runtime.dispose();
  });

  it('runs the hand-written loop inside the interpreter', () => {
    const handSum = runtime.defineInline(QUICKJS_HAND_SOURCE, 'handSum');
    expect(handSum(new Float64Array([1, 1, 1]))).toBe(3);
    expect(handSum(new Float64Array(0))).toBe(0);
    expect(handSum(new Float64Array([0.5, 0.25, 0.125]))).toBe(0.875);
  });

  it('runs the built-in reduce inside the interpreter', () => {
    const builtinSum = runtime.defineInline(QUICKJS_BUILTIN_SOURCE, 'builtinSum');
    expect(builtinSum(new Float64Array([1, 1, 1]))).toBe(3);
    expect(builtinSum(new Float64Array(0))).toBe(0);
  });

  it('copies only the viewed part of a typed array', () => {
    const handSum = runtime.defineInline(QUICKJS_HAND_SOURCE, 'handSum');
    const view = new Float64Array([1, 2, 3, 4]).subarray(1, 3);
    expect(handSum(view)).toBe(5);
  });

  it('marshals numbers alongside arrays', () => {
    const scale = runtime.defineInline('function scale(a: Float64Array, k: number): number { return a[0] * k; }', 'scale');
    expect(scale(new Float64Array([2]), 3)).toBe(6);
  });

  it('looks up functions already defined in the interpreter', () => {
    runtime.defineInline('function half(x: number): number { return x / 2; }', 'half');
    expect(runtime.getCallable('half')(9)).toBe(4.5);
  });

  it('rejects names that are not functions', () => {
    expect(() => runtime.getCallable('noSuchFunction')).toThrow(TypeError);
    expect(() => runtime.defineInline('var answer = 42;', 'answer')).toThrow(TypeError);
  });

  it('surfaces errors thrown inside the interpreter', () => {
    const fail = runtime.defineInline('function fail(): number { throw new Error("inside"); }', 'fail');
    expect(() => fail()).toThrow('inside');
  });
});
