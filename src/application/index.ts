export {
  eventInputSchema,
  wireEventSchema,
  eventBatchSchema,
  agentRegistrationSchema,
  createEvent,
  parseEvent,
  isEvent,
} from './event-schema.js';
export type { EventInput, CollectedEvent } from './event-schema.js';
export { EventSerializer, toWireValue, classify, DEFAULT_MAX_EVENT_BYTES } from './serializer.js';
export type { PayloadValue, TruncationMarker } from './serializer.js';
export { IngestionQueue } from './ingestion-queue.js';
export type { QueuedEvent } from './ingestion-queue.js';
export { exponentialBackoff, sleep } from './backoff.js';
export type { BackoffOptions, BackoffPolicy } from './backoff.js';
export type { CollectorTransport, DeliveryOutcome, OutgoingBatch } from './delivery.js';
export { FlushEngine } from './flush-engine.js';
export type { CycleResult, FlushEngineOptions, FlushSummary, FlushTrigger } from './flush-engine.js';
export { instrument, trackCalls } from './instrument.js';
export type { CallContext, CallHooks, EventSink, InstrumentOptions, TrackCallsOptions } from './instrument.js';
