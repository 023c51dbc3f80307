/**
 * Payload and cache entry serialization
 *
 * Payloads are JSON with two tagged extensions, `Date` and `bigint`, so that
 * `decode(encode(p))` gives back an equal value for any structured payload.
 */

import { z } from 'zod';
import { SerializationError } from './errors.mjs';
import type { CacheEntry } from './types.mjs';

const TYPE_KEY = '__type';

type Encoded = null | boolean | number | string | Encoded[] | { [key: string]: Encoded };

const CacheEntrySchema = z.object({
  v: z.literal(1),
  payload: z.string(),
  etag: z.string().min(1),
  createdAt: z.number().int().nonnegative(),
  ttl: z.number().int().positive(),
});

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function hasToJSON(value: object): value is { toJSON(): unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function typeName(value: object): string {
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
}

function encodeValue(value: unknown, path: string, seen: Set<object>): Encoded {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      if (!Number.isFinite(value)) {
        throw new SerializationError(`Non-finite number ${value}`, path);
      }
      return value;
    case 'bigint':
      return { [TYPE_KEY]: 'BigInt', value: value.toString() };
    case 'undefined':
      throw new SerializationError('Undefined value', path);
    case 'function':
    case 'symbol':
      throw new SerializationError(`Value of type ${typeof value} is not serializable`, path);
  }

  if (value === null) {
    return null;
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new SerializationError('Invalid Date', path);
    }
    return { [TYPE_KEY]: 'Date', value: value.toISOString() };
  }

  if (seen.has(value)) {
    throw new SerializationError('Circular reference', path);
  }

  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown, index) => encodeValue(item, `${path}[${index}]`, seen));
    }

    if (isPlainObject(value)) {
      const entries: Array<[string, Encoded]> = [];
      for (const [key, item] of Object.entries(value)) {
        // Absent and undefined properties are indistinguishable once decoded
        if (item === undefined) continue;
        entries.push([key, encodeValue(item, `${path}.${key}`, seen)]);
      }
      const encoded = Object.fromEntries(entries);
      return Object.hasOwn(value, TYPE_KEY) ? { [TYPE_KEY]: 'Object', value: encoded } : encoded;
    }

    if (hasToJSON(value)) {
      return encodeValue(value.toJSON(), path, seen);
    }

    throw new SerializationError(`Instance of ${typeName(value)} is not serializable`, path);
  } finally {
    seen.delete(value);
  }
}

function decodeEntries(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).map(([key, item]) => [key, decodeValue(item)]));
}

function decodeValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => decodeValue(item));
  }

  if (!isRecord(value)) {
    return value;
  }

  if (!(TYPE_KEY in value)) {
    return decodeEntries(value);
  }

  const tag = value[TYPE_KEY];
  const inner = value.value;

  if (tag === 'Date' && typeof inner === 'string') {
    return new Date(inner);
  }
  if (tag === 'BigInt' && typeof inner === 'string') {
    return BigInt(inner);
  }
  if (tag === 'Object' && isRecord(inner)) {
    return decodeEntries(inner);
  }

  throw new SerializationError(`Unknown type tag ${JSON.stringify(tag)}`);
}

/**
 * Encode a payload to its stable string form
 *
 * @throws SerializationError when the payload holds a non-representable value
 */
export function encode(payload: unknown): string {
  return JSON.stringify(encodeValue(payload, '$', new Set()));
}

/**
 * Decode a string produced by {@link encode}
 */
export function decode(text: string): unknown {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new SerializationError('Malformed payload');
  }
  return decodeValue(parsed);
}

/**
 * Encode a cache entry into the envelope written to the store
 */
export function encodeEntry(entry: CacheEntry): string {
  return JSON.stringify({
    v: 1,
    payload: entry.payload,
    etag: entry.etag,
    createdAt: entry.createdAt,
    ttl: entry.ttl,
  });
}

/**
 * Decode and validate an envelope read from the store
 *
 * @throws SerializationError when the stored value is not a valid envelope
 */
export function decodeEntry(raw: string): CacheEntry {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new SerializationError('Malformed cache entry');
  }

  const result = CacheEntrySchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new SerializationError(`Invalid cache entry (${issue?.message ?? 'unknown issue'})`, `$.${issue?.path.join('.') ?? ''}`);
  }

  const { payload, etag, createdAt, ttl } = result.data;
  return { payload, etag, createdAt, ttl };
}
