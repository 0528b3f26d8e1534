import { BaseBeaconClient } from './base-client.js';
import type { BeaconClientOptions } from './base-client.js';

export interface TimerClientOptions extends BeaconClientOptions {
  /**
   * Close the client from a `beforeExit` hook when the host forgets to.
   * Best effort only: `process.exit()` and signals skip it.
   */
  exitHook?: boolean | undefined;
}

/**
 * Client whose time-based flush runs off a re-arming timer.
 *
 * `track()` is synchronous and returns immediately; flushing happens on
 * the event loop between the host's own work. The timer is unref'd, so
 * an idle client never keeps the process alive.
 *
 * @example
 * const client = new BeaconClient({ apiKey: process.env.BEACON_API_KEY });
 * await client.registerAgent({ name: 'support-bot', framework: 'custom' });
 * client.track({ type: EventType.TOOL_CALL, name: 'search', payload: { query } });
 * await client.close();
 */
export class BeaconClient extends BaseBeaconClient {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private readonly exitHook: boolean;
  private readonly onBeforeExit = (): void => {
    void this.close();
  };

  constructor(options: TimerClientOptions = {}) {
    super(options);
    this.exitHook = options.exitHook ?? true;
    if (this.exitHook) {
      process.once('beforeExit', this.onBeforeExit);
    }
    this.startBackground();
  }

  protected override startBackground(): void {
    this.armTimer();
  }

  protected override stopBackground(): Promise<void> {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.exitHook) {
      process.removeListener('beforeExit', this.onBeforeExit);
    }
    return Promise.resolve();
  }

  // Re-armed after each run, so the interval counts from the end of the
  // previous flush attempt rather than its start.
  private armTimer(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.backgroundFlush('interval').then(() => {
        if (this.state === 'open') this.armTimer();
      });
    }, this.config.flushIntervalMs);
    this.timer.unref();
  }
}
