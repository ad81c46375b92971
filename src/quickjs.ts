import type { QuickJSContext, QuickJSHandle } from 'quickjs-emscripten';
import { UnavailableError } from './errors.js';
import type { ExternalRuntime, ForeignFunction, ForeignValue } from './runtime.js';
import { transpile } from './utils.js';

const TO_FLOAT64_ARRAY = '__sumraceFloat64Array';

const bytesOf = (array: Float64Array): ArrayBufferLike => {
  if (array.byteOffset === 0 && array.byteLength === array.buffer.byteLength) {
    return array.buffer;
  }
  return array.slice().buffer;
};

/**
 * QuickJS compiled to WebAssembly, run in-process. Every call copies its typed-array arguments into the
 * interpreter's heap and reads the result back.
 */
export class QuickJsRuntime implements ExternalRuntime {
  readonly name = 'quickjs';
  #vm: QuickJSContext;
  #handles: QuickJSHandle[] = [];
  #toFloat64Array: QuickJSHandle;

  static async create(): Promise<QuickJsRuntime> {
    let vm: QuickJSContext;
    try {
      const { getQuickJS } = await import('quickjs-emscripten');
      const QuickJS = await getQuickJS();
      vm = QuickJS.newContext();
    } catch (e) {
      throw new UnavailableError(`QuickJS is not available: ${e instanceof Error ? e.message : String(e)}`);
    }
    try {
      return new QuickJsRuntime(vm);
    } catch (e) {
      vm.dispose();
      throw e;
    }
  }

  private constructor(vm: QuickJSContext) {
    this.#vm = vm;
    vm.unwrapResult(vm.evalCode(`function ${TO_FLOAT64_ARRAY}(buffer) { return new Float64Array(buffer); }`)).dispose();
    this.#toFloat64Array = this.#lookup(TO_FLOAT64_ARRAY);
  }

  #lookup(name: string): QuickJSHandle {
    const vm = this.#vm;
    const handle = vm.getProp(vm.global, name);
    if (vm.typeof(handle) !== 'function') {
      handle.dispose();
      throw new TypeError(`QuickJS global "${name}" is not a function`);
    }
    this.#handles.push(handle);
    return handle;
  }

  #marshal(value: ForeignValue): QuickJSHandle {
    const vm = this.#vm;
    if (typeof value === 'number') {
      return vm.newNumber(value);
    }
    const buffer = vm.newArrayBuffer(bytesOf(value));
    try {
      return vm.unwrapResult(vm.callFunction(this.#toFloat64Array, vm.undefined, buffer));
    } finally {
      buffer.dispose();
    }
  }

  getCallable(name: string): ForeignFunction {
    const vm = this.#vm;
    const fn = this.#lookup(name);

    return (...args: ForeignValue[]): unknown => {
      const handles: QuickJSHandle[] = [];
      try {
        for (const arg of args) {
          handles.push(this.#marshal(arg));
        }
        const result = vm.unwrapResult(vm.callFunction(fn, vm.undefined, ...handles));
        handles.push(result);
        const value: unknown = vm.dump(result);
        return value;
      } finally {
        for (const handle of handles) {
          handle.dispose();
        }
      }
    };
  }

  defineInline(source: string, name: string): ForeignFunction {
    const vm = this.#vm;
    vm.unwrapResult(vm.evalCode(transpile(source), `${name}.js`)).dispose();
    return this.getCallable(name);
  }

  dispose() {
    for (const handle of this.#handles.splice(0)) {
      handle.dispose();
    }
    this.#vm.dispose();
  }
}
