import type { Event, WireEvent, WireValue } from '../domain/index.js';

/** Hard per-event ceiling for the JSON-encoded wire form. */
export const DEFAULT_MAX_EVENT_BYTES = 64 * 1024;

const MAX_DEPTH = 32;

type WireRecord = { [key: string]: WireValue };

/**
 * Every value a producer can put in a payload falls in exactly one of
 * these kinds. `opaque` is the escape hatch for objects that are neither
 * containers nor one of the recognised built-ins.
 */
export type PayloadValue =
  | { readonly kind: 'null' }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'bigint'; readonly value: bigint }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'symbol'; readonly value: symbol }
  | { readonly kind: 'function'; readonly name: string }
  | { readonly kind: 'binary'; readonly bytes: Uint8Array }
  | { readonly kind: 'date'; readonly value: Date }
  | { readonly kind: 'set'; readonly items: readonly unknown[] }
  | { readonly kind: 'map'; readonly entries: readonly (readonly [unknown, unknown])[] }
  | { readonly kind: 'array'; readonly items: readonly unknown[] }
  | { readonly kind: 'error'; readonly value: Error }
  | { readonly kind: 'json'; readonly value: unknown }
  | { readonly kind: 'record'; readonly value: object }
  | { readonly kind: 'opaque'; readonly value: object };

/** Classifies a value. May throw if a getter or proxy trap throws. */
export function classify(value: unknown): PayloadValue {
  switch (typeof value) {
    case 'undefined':
      return { kind: 'null' };
    case 'boolean':
      return { kind: 'boolean', value };
    case 'number':
      return { kind: 'number', value };
    case 'bigint':
      return { kind: 'bigint', value };
    case 'string':
      return { kind: 'string', value };
    case 'symbol':
      return { kind: 'symbol', value };
    case 'function':
      return { kind: 'function', name: value.name };
    case 'object':
      break;
  }

  if (typeof value !== 'object' || value === null) return { kind: 'null' };
  if (value instanceof Date) return { kind: 'date', value };
  if (value instanceof Uint8Array) return { kind: 'binary', bytes: value };
  if (value instanceof ArrayBuffer) return { kind: 'binary', bytes: new Uint8Array(value) };
  if (ArrayBuffer.isView(value)) {
    return { kind: 'binary', bytes: new Uint8Array(value.buffer, value.byteOffset, value.byteLength) };
  }
  if (value instanceof Set) return { kind: 'set', items: [...value] };
  if (value instanceof Map) return { kind: 'map', entries: [...value.entries()] };
  if (Array.isArray(value)) return { kind: 'array', items: value };
  if (value instanceof Error) return { kind: 'error', value };
  if ('toJSON' in value && typeof value.toJSON === 'function') {
    return { kind: 'json', value: value.toJSON() };
  }

  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null || proto === Object.prototype) return { kind: 'record', value };
  return { kind: 'opaque', value };
}

/**
 * Encodes any value into a JSON-safe form.
 *
 * Binary → base64, Set → array, Map → object, Date → ISO string,
 * bigint → decimal string. A value that cannot be inspected becomes a
 * `[Unserializable: …]` placeholder instead of failing the whole event.
 */
export function toWireValue(value: unknown): WireValue {
  return encode(value, 0, new WeakSet<object>());
}

function encode(value: unknown, depth: number, seen: WeakSet<object>): WireValue {
  if (depth > MAX_DEPTH) return '[MaxDepth]';

  const node = classifySafely(value);
  if (node === undefined) return placeholder(value);

  switch (node.kind) {
    case 'null':
      return null;
    case 'boolean':
    case 'string':
      return node.value;
    case 'number':
      return Number.isFinite(node.value) ? node.value : String(node.value);
    case 'bigint':
      return node.value.toString();
    case 'symbol':
      return node.value.toString();
    case 'function':
      return `[Function ${node.name || 'anonymous'}]`;
    case 'binary':
      return Buffer.from(node.bytes.buffer, node.bytes.byteOffset, node.bytes.byteLength).toString('base64');
    case 'date':
      return Number.isNaN(node.value.getTime()) ? 'Invalid Date' : node.value.toISOString();
    case 'error':
      return { name: node.value.name, message: node.value.message };
    case 'json':
      return encode(node.value, depth + 1, seen);
    case 'set':
    case 'array':
      return guarded(value, seen, () => node.items.map((item) => encode(item, depth + 1, seen)));
    case 'map':
      return guarded(value, seen, () => {
        const out: WireRecord = {};
        for (const [key, item] of node.entries) {
          out[String(key)] = encode(item, depth + 1, seen);
        }
        return out;
      });
    case 'record':
    case 'opaque':
      return guarded(value, seen, () => encodeRecord(node.value, depth, seen));
    default:
      return assertNever(node);
  }
}

function classifySafely(value: unknown): PayloadValue | undefined {
  try {
    return classify(value);
  } catch {
    return undefined;
  }
}

/** Encodes own enumerable properties. `undefined` fields are omitted. */
function encodeRecord(value: object, depth: number, seen: WeakSet<object>): WireRecord {
  const out: WireRecord = {};
  for (const [key, item] of Object.entries(value)) {
    if (item === undefined) continue;
    out[key] = encode(item, depth + 1, seen);
  }
  return out;
}

/** Cycle detection plus a catch-all for throwing getters. */
function guarded(value: unknown, seen: WeakSet<object>, run: () => WireValue): WireValue {
  if (typeof value !== 'object' || value === null) return run();
  if (seen.has(value)) return '[Circular]';

  seen.add(value);
  try {
    return run();
  } catch {
    return placeholder(value);
  } finally {
    seen.delete(value);
  }
}

function placeholder(value: unknown): string {
  let label: string = typeof value;
  try {
    if (typeof value === 'object' && value !== null) {
      label = value.constructor?.name ?? 'Object';
    }
  } catch {
    label = 'Object';
  }
  return `[Unserializable: ${label}]`;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled payload kind: ${JSON.stringify(value)}`);
}

/**
 * Encodes a payload or metadata record and freezes the result in depth.
 * Non-record encodings (a record whose `toJSON` returns a scalar) are
 * wrapped as `{ value }`.
 */
export function snapshotRecord(value: Record<string, unknown>): WireRecord {
  const encoded = toWireValue(value);
  const record: WireRecord =
    encoded !== null && typeof encoded === 'object' && !Array.isArray(encoded) ? encoded : { value: encoded };
  deepFreeze(record);
  return record;
}

function deepFreeze(value: WireValue): void {
  if (value === null || typeof value !== 'object') return;
  const children = Array.isArray(value) ? value : Object.values(value);
  for (const child of children) deepFreeze(child);
  Object.freeze(value);
}

export type TruncationMarker = {
  _truncated: true;
  original_bytes: number;
  preview: string;
};

type SizedPart = 'payload' | 'metadata';

/**
 * Turns Event records into wire events, enforcing the per-event size cap.
 *
 * Events already hold encoded snapshots, so this only measures. When an
 * event is over the cap the larger of payload and metadata is replaced by
 * a truncation marker carrying a prefix of its JSON; a part that fits is
 * left alone unless the event is still too large. The event itself is
 * never rejected.
 */
export class EventSerializer {
  private readonly maxEventBytes: number;

  constructor(maxEventBytes: number = DEFAULT_MAX_EVENT_BYTES) {
    this.maxEventBytes = maxEventBytes;
  }

  serialize(event: Event): WireEvent {
    let wire: WireEvent = {
      id: event.id,
      type: event.type,
      name: event.name,
      payload: event.payload,
      metadata: event.metadata,
      timestamp: event.timestamp,
    };
    if (byteLength(wire) <= this.maxEventBytes) return wire;

    const [larger, smaller]: [SizedPart, SizedPart] =
      byteLength(event.metadata) > byteLength(event.payload) ? ['metadata', 'payload'] : ['payload', 'metadata'];

    wire = this.truncatePart(wire, larger, event[larger]);
    if (byteLength(wire) <= this.maxEventBytes) return wire;

    wire = this.truncatePart(wire, smaller, event[smaller]);
    // Both markers now; give the larger part whatever room the smaller one freed.
    return this.truncatePart(wire, larger, event[larger]);
  }

  serializeBatch(events: readonly Event[]): WireEvent[] {
    return events.map((event) => this.serialize(event));
  }

  private truncatePart(wire: WireEvent, part: SizedPart, original: Readonly<WireRecord>): WireEvent {
    const overhead = byteLength(wire) - byteLength(wire[part]);
    const marker = this.truncate(original, overhead);
    return part === 'payload' ? { ...wire, payload: marker } : { ...wire, metadata: marker };
  }

  /**
   * Builds a marker that fits in whatever room the rest of the event
   * leaves (`overhead` bytes are already taken).
   */
  private truncate(value: Readonly<WireRecord>, overhead: number): TruncationMarker {
    const json = JSON.stringify(value);
    const originalBytes = Buffer.byteLength(json, 'utf8');
    let budget = Math.max(0, this.maxEventBytes - overhead - 128);

    for (;;) {
      const marker: TruncationMarker = {
        _truncated: true,
        original_bytes: originalBytes,
        preview: prefixBytes(json, budget),
      };
      if (budget === 0 || overhead + byteLength(marker) <= this.maxEventBytes) {
        return marker;
      }
      budget = Math.floor(budget / 2);
    }
  }
}

function byteLength(value: unknown): number {
  return Buffer.byteLength(JSON.stringify(value), 'utf8');
}

/** Longest prefix of `text` whose UTF-8 encoding fits in `maxBytes`. */
function prefixBytes(text: string, maxBytes: number): string {
  const bytes = Buffer.from(text, 'utf8');
  if (bytes.length <= maxBytes) return text;
  let end = maxBytes;
  // Step back off UTF-8 continuation bytes so no character is split.
  while (end > 0 && ((bytes[end] ?? 0) & 0xc0) === 0x80) end -= 1;
  return bytes.subarray(0, end).toString('utf8');
}
