import type { Logger } from 'pino';
import type { EventType } from '../../domain/index.js';
import { instrument, trackCalls } from '../../application/instrument.js';
import type { EventSink } from '../../application/instrument.js';
import { getDefaultClient } from './default-client.js';

export interface MonitorOptions {
  /** Client to report to. Defaults to the process-wide default client. */
  client?: EventSink | undefined;
  type?: EventType | undefined;
  name?: string | undefined;
  captureArgs?: boolean | undefined;
  captureResult?: boolean | undefined;
  log?: Logger | undefined;
}

/**
 * Wraps `fn` so every call is reported as an event. The wrapper behaves
 * exactly like `fn`: same return value, same thrown error.
 *
 * ```ts
 * const search = monitor(async (query: string) => index.lookup(query), {
 *   type: EventType.TOOL_CALL,
 *   name: 'search',
 * });
 * ```
 */
export function monitor<A extends unknown[], R>(fn: (...args: A) => R, options: MonitorOptions = {}): (...args: A) => R {
  const { client } = options;
  const hooks = trackCalls({
    sink: client ?? getDefaultClient,
    type: options.type,
    name: options.name,
    captureArgs: options.captureArgs,
    captureResult: options.captureResult,
    log: options.log,
  });
  return instrument(fn, hooks, { log: options.log });
}
