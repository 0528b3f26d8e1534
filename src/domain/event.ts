/**
 * Core domain types for the agent-beacon event model.
 *
 * These types define the canonical shape of an event as it flows
 * from a producer through the queue to the collector. They carry
 * no framework dependencies.
 */

/** Closed set of activity kinds an agent can report, in wire spelling. */
export const EVENT_TYPES = [
  'tool_call',
  'llm_invoke',
  'data_access',
  'api_call',
  'file_write',
  'decision',
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

export const EventType = {
  TOOL_CALL: 'tool_call',
  LLM_INVOKE: 'llm_invoke',
  DATA_ACCESS: 'data_access',
  API_CALL: 'api_call',
  FILE_WRITE: 'file_write',
  DECISION: 'decision',
} as const satisfies Record<string, EventType>;

/**
 * Key/value payload attached to every event, held as a deep-frozen
 * JSON-safe snapshot of what the producer passed in.
 */
export type EventPayload = { readonly [key: string]: WireValue };

/** Producer- or wrapper-supplied context (durations, run ids, model names). */
export type EventMetadata = { readonly [key: string]: WireValue };

/**
 * Canonical Event record.
 *
 * `id` and `timestamp` are assigned at construction. Once built the
 * record is frozen all the way down; the pipeline only copies and
 * serializes it, so later changes to the producer's objects never reach
 * the collector.
 */
export interface Event {
  readonly id: string;
  readonly type: EventType;
  readonly name: string;
  readonly payload: EventPayload;
  readonly metadata: EventMetadata;
  readonly timestamp: string; // ISO-8601
}

/** JSON-safe value produced by the serializer. */
export type WireValue =
  | null
  | boolean
  | number
  | string
  | WireValue[]
  | { [key: string]: WireValue };

/** Event as it travels in `POST /api/v1/agents/{agent_id}/events`. */
export interface WireEvent {
  readonly id: string;
  readonly type: EventType;
  readonly name: string;
  readonly payload: { [key: string]: WireValue };
  readonly metadata: { [key: string]: WireValue };
  readonly timestamp: string;
}

/** Agent identity obtained once per client session. */
export interface AgentRegistration {
  readonly name: string;
  readonly framework: string;
  readonly metadata?: Record<string, unknown> | undefined;
}
