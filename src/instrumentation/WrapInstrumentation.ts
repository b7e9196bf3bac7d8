/**
 * WrapInstrumentation
 *
 * Instrumentation by function wrapping. Functions passed through wrap() or
 * wrapAll() report call and return events to whatever hooks are installed;
 * with no hooks installed a wrapper only forwards to the original.
 *
 * Call-site metadata is computed once per wrapped function.
 */

import { callerSourceLabel } from './FrameInspector.js';
import type {
  CallSiteMetadata,
  InstrumentationHooks,
  InstrumentationMechanism
} from '../core/types.js';

export interface WrapInstrumentationOptions {
  /**
   * Deliver the return event of a promise-returning function when the
   * promise settles instead of when the function returns
   */
  trackAsync?: boolean;
}

const NATIVE_CODE_PATTERN = /\{\s*\[native code\]\s*\}\s*$/;

export class WrapInstrumentation implements InstrumentationMechanism {
  private hooks: InstrumentationHooks | null = null;
  private frequency: number = 0;
  private invocations: number = 0;
  private trackAsync: boolean;

  constructor(options: WrapInstrumentationOptions = {}) {
    this.trackAsync = options.trackAsync ?? false;
  }

  get installed(): boolean {
    return this.hooks !== null;
  }

  install(hooks: InstrumentationHooks, frequency: number): void {
    this.hooks = hooks;
    this.frequency = frequency;
    this.invocations = 0;
  }

  uninstall(): void {
    this.hooks = null;
  }

  setTrackAsync(trackAsync: boolean): void {
    this.trackAsync = trackAsync;
  }

  /**
   * Wrap a function. `this`, arguments, the return value and thrown errors
   * pass through unchanged.
   */
  wrap<A extends unknown[], R>(
    fn: (...args: A) => R,
    hints: CallSiteMetadata = {}
  ): (this: unknown, ...args: A) => R {
    const site = describeFunction(fn, {
      ...hints,
      source: hints.source ?? callerSourceLabel()
    });
    return this.createWrapper(fn, site);
  }

  /**
   * Copy `target`, wrapping every plain function property. Class
   * constructors and non-function values are copied unchanged.
   */
  wrapAll(target: Record<string, unknown>, source?: string): Record<string, unknown> {
    const resolvedSource = source ?? callerSourceLabel();
    const wrapped: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(target)) {
      if (isCallable(value) && !isClass(value)) {
        const site = describeFunction(value, {
          name: value.name || key,
          source: resolvedSource
        });
        wrapped[key] = this.createWrapper(value, site);
      } else {
        wrapped[key] = value;
      }
    }
    return wrapped;
  }

  private createWrapper<A extends unknown[], R>(
    fn: (...args: A) => R,
    site: CallSiteMetadata
  ): (this: unknown, ...args: A) => R {
    const mechanism = this;

    const wrapper = function (this: unknown, ...args: A): R {
      if (!mechanism.admit()) {
        return fn.apply(this, args);
      }

      mechanism.hooks?.onCall(site);

      let result: R;
      try {
        result = fn.apply(this, args);
      } catch (error) {
        mechanism.deliverReturn(site);
        throw error;
      }

      if (mechanism.trackAsync && isPromiseLike(result)) {
        const settle = (): void => mechanism.deliverReturn(site);
        void result.then(settle, settle);
      } else {
        mechanism.deliverReturn(site);
      }
      return result;
    };

    Object.defineProperty(wrapper, 'name', { value: fn.name, configurable: true });
    return wrapper;
  }

  /**
   * Decide whether this invocation is delivered, honouring the sampling frequency
   */
  private admit(): boolean {
    if (this.hooks === null) {
      return false;
    }
    if (this.frequency <= 1) {
      return true;
    }
    this.invocations += 1;
    return this.invocations % this.frequency === 0;
  }

  private deliverReturn(site: CallSiteMetadata): void {
    // Hooks removed while the call was in flight receive nothing
    this.hooks?.onReturn(site);
  }
}

/**
 * Build call-site metadata for a function, preferring explicit hints
 */
export function describeFunction(
  fn: Function,
  hints: CallSiteMetadata = {}
): CallSiteMetadata {
  return {
    name: hints.name ?? fn.name,
    source: hints.source,
    definedAtLine: hints.definedAtLine,
    isNative: hints.isNative ?? isNativeFunction(fn)
  };
}

export function isNativeFunction(fn: Function): boolean {
  return NATIVE_CODE_PATTERN.test(Function.prototype.toString.call(fn));
}

function isCallable(value: unknown): value is (...args: unknown[]) => unknown {
  return typeof value === 'function';
}

function isClass(fn: Function): boolean {
  return /^class[\s{]/.test(Function.prototype.toString.call(fn));
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

