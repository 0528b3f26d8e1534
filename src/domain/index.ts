export { EventType, EVENT_TYPES } from './event.js';
export type {
  Event,
  EventPayload,
  EventMetadata,
  WireValue,
  WireEvent,
  AgentRegistration,
} from './event.js';
export {
  BeaconError,
  ConfigurationError,
  ProducerError,
  TransientDeliveryError,
  FatalDeliveryError,
  RegistrationError,
} from './errors.js';
export type { TransientCause } from './errors.js';
