import type { Logger } from 'pino';
import { EventType } from '../domain/index.js';
import type { Event, WireValue } from '../domain/index.js';
import type { EventInput } from './event-schema.js';
import { toWireValue } from './serializer.js';

/** Anything that accepts events: the clients, or a test double. */
export interface EventSink {
  track(event: Event | EventInput): void;
}

/** One invocation of an instrumented function. */
export interface CallContext {
  readonly name: string;
  readonly args: readonly unknown[];
}

/**
 * The "instrumentable call" capability. Hooks observe a call; they can
 * not change its arguments, result or error.
 */
export interface CallHooks {
  before?(call: CallContext): void;
  after?(call: CallContext, result: unknown, durationMs: number): void;
  onError?(call: CallContext, error: unknown, durationMs: number): void;
}

export interface InstrumentOptions {
  /** Label used in the call context. Defaults to the function's name. */
  name?: string | undefined;
  /** Receives hook failures. */
  log?: Logger | undefined;
}

/**
 * Wraps a sync or async function with observation hooks.
 *
 * The wrapper returns exactly what `fn` returns (the same promise object
 * for async functions) and rethrows exactly what it throws. For promises,
 * `after`/`onError` run when the promise settles.
 */
export function instrument<A extends unknown[], R>(
  fn: (...args: A) => R,
  hooks: CallHooks,
  options: InstrumentOptions = {},
): (...args: A) => R {
  const name = options.name ?? (fn.name || 'anonymous');
  const guard = (hook: string, run: () => void): void => {
    try {
      run();
    } catch (err: unknown) {
      options.log?.warn({ err, hook, function: name }, 'Instrumentation hook failed');
    }
  };

  return function instrumented(this: unknown, ...args: A): R {
    const call: CallContext = { name, args };
    guard('before', () => hooks.before?.(call));
    const startedAt = performance.now();

    let result: R;
    try {
      result = fn.apply(this, args);
    } catch (error: unknown) {
      guard('onError', () => hooks.onError?.(call, error, performance.now() - startedAt));
      throw error;
    }

    if (isPromiseLike(result)) {
      // Observe on a side branch; the caller still gets the original promise.
      result.then(
        (value) => guard('after', () => hooks.after?.(call, value, performance.now() - startedAt)),
        (error: unknown) => guard('onError', () => hooks.onError?.(call, error, performance.now() - startedAt)),
      );
      return result;
    }

    guard('after', () => hooks.after?.(call, result, performance.now() - startedAt));
    return result;
  };
}

export interface TrackCallsOptions {
  /** Where events go; a function is resolved on every call. */
  sink: EventSink | (() => EventSink | null);
  type?: EventType | undefined;
  /** Event name. Defaults to the instrumented function's name. */
  name?: string | undefined;
  captureArgs?: boolean | undefined;
  captureResult?: boolean | undefined;
  log?: Logger | undefined;
}

/**
 * Hooks that report every call as one event:
 *
 * - payload: `arguments` (serialized), `result` (when defined), `error`
 * - metadata: `function`, `duration_ms`, `success`
 */
export function trackCalls(options: TrackCallsOptions): CallHooks {
  const captureArgs = options.captureArgs ?? true;
  const captureResult = options.captureResult ?? true;

  const emit = (call: CallContext, durationMs: number, outcome: { result?: unknown; error?: unknown }, success: boolean): void => {
    const sink = typeof options.sink === 'function' ? options.sink() : options.sink;
    if (sink === null) {
      options.log?.warn({ function: call.name }, 'No client configured, skipping tracking');
      return;
    }

    const payload: Record<string, WireValue> = {};
    if (captureArgs) {
      payload['arguments'] = toWireValue(call.args);
    }
    if (captureResult && success && outcome.result !== undefined) {
      payload['result'] = toWireValue(outcome.result);
    }
    if (!success) {
      payload['error'] = describeError(outcome.error);
    }

    sink.track({
      type: options.type ?? EventType.TOOL_CALL,
      name: options.name ?? call.name,
      payload,
      metadata: {
        function: call.name,
        duration_ms: Math.round(durationMs * 100) / 100,
        success,
      },
    });
  };

  return {
    after: (call, result, durationMs) => emit(call, durationMs, { result }, true),
    onError: (call, error, durationMs) => emit(call, durationMs, { error }, false),
  };
}

function describeError(error: unknown): { type: string; message: string } {
  if (error instanceof Error) {
    return { type: error.name, message: error.message };
  }
  return { type: typeof error, message: String(error) };
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function')
    && value !== null
    && 'then' in value
    && typeof value.then === 'function'
  );
}
