export { BaseBeaconClient } from './base-client.js';
export type { BeaconClientOptions, ClientState } from './base-client.js';
export { BeaconClient } from './beacon-client.js';
export type { TimerClientOptions } from './beacon-client.js';
export { AsyncBeaconClient } from './async-beacon-client.js';
export { withBeacon } from './scoped.js';
export { initDefaultClient, getDefaultClient, teardownDefaultClient } from './default-client.js';
export { monitor } from './monitor.js';
export type { MonitorOptions } from './monitor.js';
