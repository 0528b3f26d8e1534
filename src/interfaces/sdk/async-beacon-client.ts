import { sleep } from '../../application/backoff.js';
import { BaseBeaconClient } from './base-client.js';
import type { BeaconClientOptions } from './base-client.js';

/**
 * Client whose time-based flush is a single long-lived async task.
 *
 * The task only yields at its awaits (the interval sleep, the delivery
 * call and backoff waits), never while a batch is being formed. Meant
 * for scoped use:
 *
 * @example
 * await withBeacon(() => new AsyncBeaconClient(), async (client) => {
 *   await client.registerAgent({ name: 'researcher', framework: 'langchain' });
 *   client.track({ type: EventType.LLM_INVOKE, name: 'plan' });
 * });
 */
export class AsyncBeaconClient extends BaseBeaconClient {
  private readonly stop = new AbortController();
  private loop: Promise<void> = Promise.resolve();

  constructor(options: BeaconClientOptions = {}) {
    super(options);
    this.startBackground();
  }

  protected override startBackground(): void {
    this.loop = this.runLoop(this.stop.signal);
  }

  protected override stopBackground(): Promise<void> {
    this.stop.abort();
    return this.loop;
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await sleep(this.config.flushIntervalMs, signal, { unref: true });
      if (signal.aborted) break;
      await this.backgroundFlush('interval');
    }
    this.log.debug('Flush loop stopped');
  }
}
