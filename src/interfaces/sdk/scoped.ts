import type { BaseBeaconClient } from './base-client.js';

/**
 * Acquire-on-open / release-on-close scope.
 *
 * The client is built inside the scope, handed to `fn`, and closed (with
 * its final flush) when `fn` settles. If `fn` throws, the error is
 * rethrown after the close.
 */
export async function withBeacon<C extends BaseBeaconClient, T>(
  open: () => C,
  fn: (client: C) => Promise<T> | T,
): Promise<T> {
  const client = open();
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
