import { createContext, Script, type Context } from 'node:vm';
import { UnavailableError } from './errors.js';
import { transpile } from './utils.js';

export type ForeignValue = number | Float64Array;

export interface ForeignFunction {
  (...args: ForeignValue[]): unknown;
}

/**
 * A second runtime the host can call into: look up a function it already has, or hand it source
 * text that defines one. Inline source is TypeScript and is transpiled before the runtime sees it.
 */
export interface ExternalRuntime {
  readonly name: string;
  getCallable(name: string): ForeignFunction;
  defineInline(source: string, name: string): ForeignFunction;
  dispose(): void;
}

export const isCallable = (value: unknown): value is ForeignFunction => typeof value === 'function';

const isRecord = (value: unknown): value is Record<string, unknown> => value !== null && (typeof value === 'object' || typeof value === 'function');

/**
 * Modules from the host's package ecosystem plus a separate `node:vm` context for inline source.
 * Callables are addressed as `specifier` (the module's default export) or `specifier#export`.
 */
export class HostModuleRuntime implements ExternalRuntime {
  readonly name = 'node';
  #modules: Map<string, unknown>;
  #context: Context = createContext({});

  static async create(specifiers: readonly string[] = []): Promise<HostModuleRuntime> {
    const modules = new Map<string, unknown>();
    for (const specifier of specifiers) {
      try {
        const mod: unknown = await import(specifier);
        modules.set(specifier, mod);
      } catch (e) {
        throw new UnavailableError(`Unable to load module "${specifier}": ${e instanceof Error ? e.message : String(e)}`);
      }
    }
    return new HostModuleRuntime(modules);
  }

  private constructor(modules: Map<string, unknown>) {
    this.#modules = modules;
  }

  getCallable(name: string): ForeignFunction {
    const [specifier, exportName = 'default'] = name.split('#');
    if (!this.#modules.has(specifier)) {
      throw new UnavailableError(`Module "${specifier}" is not loaded`);
    }
    const mod = this.#modules.get(specifier);
    const value = isRecord(mod) ? mod[exportName] : undefined;
    if (!isCallable(value)) {
      throw new TypeError(`"${name}" is not a function`);
    }
    return value;
  }

  defineInline(source: string, name: string): ForeignFunction {
    new Script(transpile(source), { filename: `${name}.js` }).runInContext(this.#context);
    const value: unknown = this.#context[name];
    if (!isCallable(value)) {
      throw new TypeError(`Inline source does not define function "${name}"`);
    }
    return value;
  }

  dispose() {
    this.#modules.clear();
  }
}
