export {
  BaseBeaconClient,
  BeaconClient,
  AsyncBeaconClient,
  withBeacon,
  initDefaultClient,
  getDefaultClient,
  teardownDefaultClient,
  monitor,
} from './interfaces/sdk/index.js';
export type { BeaconClientOptions, ClientState, TimerClientOptions, MonitorOptions } from './interfaces/sdk/index.js';

export { BeaconCallbackHandler } from './integrations/langchain.js';
export type { LLMGeneration, LLMResultLike, SerializedRunnable } from './integrations/langchain.js';

export {
  EventType,
  EVENT_TYPES,
  BeaconError,
  ConfigurationError,
  ProducerError,
  TransientDeliveryError,
  FatalDeliveryError,
  RegistrationError,
} from './domain/index.js';
export type {
  Event,
  EventPayload,
  EventMetadata,
  WireEvent,
  WireValue,
  AgentRegistration,
  TransientCause,
} from './domain/index.js';

export {
  createEvent,
  parseEvent,
  isEvent,
  EventSerializer,
  toWireValue,
  DEFAULT_MAX_EVENT_BYTES,
  instrument,
  trackCalls,
} from './application/index.js';
export type {
  EventInput,
  CallContext,
  CallHooks,
  EventSink,
  CollectorTransport,
  DeliveryOutcome,
  OutgoingBatch,
  FlushSummary,
  FlushTrigger,
  TruncationMarker,
} from './application/index.js';

export { HttpCollectorTransport } from './infrastructure/http/collector-transport.js';
export { createLogger } from './infrastructure/logger.js';
export { DEFAULT_BASE_URL } from './infrastructure/config.js';
export type { ClientConfig, ClientOptions, LogLevel } from './infrastructure/config.js';

export { SDK_VERSION } from './version.js';
