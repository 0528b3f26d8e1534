import { ConfigurationError } from '../../domain/index.js';
import type { BaseBeaconClient } from './base-client.js';

let current: BaseBeaconClient | null = null;

/**
 * Process-wide default client read by `monitor()` when no client is
 * passed explicitly. Set once with `initDefaultClient`, released with
 * `teardownDefaultClient`; replacing it requires a teardown in between.
 */
export function initDefaultClient(client: BaseBeaconClient): void {
  if (current !== null && current !== client) {
    throw new ConfigurationError('A default client is already initialised; call teardownDefaultClient() first');
  }
  current = client;
}

export function getDefaultClient(): BaseBeaconClient | null {
  return current;
}

/** Clears the default and closes it (final flush included). */
export async function teardownDefaultClient(): Promise<void> {
  const client = current;
  current = null;
  if (client !== null) {
    await client.close();
  }
}
