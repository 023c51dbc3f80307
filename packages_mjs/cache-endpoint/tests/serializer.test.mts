/**
 * Tests for payload and cache entry serialization
 */

import { describe, it, expect } from 'vitest';
import { decode, decodeEntry, encode, encodeEntry } from '../src/serializer.mjs';
import { SerializationError } from '../src/errors.mjs';

describe('encode/decode', () => {
  it('should encode plain JSON data as JSON', () => {
    expect(encode({ a: 1, b: 'x', c: [true, null] })).toBe('{"a":1,"b":"x","c":[true,null]}');
  });

  it('should round-trip nested structured data', () => {
    const payload = {
      user: { id: 7, tags: ['a', 'b'], profile: { active: true, score: 1.5 } },
      items: [{ sku: 'x-1', qty: 2 }],
      note: null,
    };
    expect(decode(encode(payload))).toEqual(payload);
  });

  it('should round-trip scalars', () => {
    expect(decode(encode('text'))).toBe('text');
    expect(decode(encode(42))).toBe(42);
    expect(decode(encode(false))).toBe(false);
    expect(decode(encode(null))).toBeNull();
  });

  it('should tag and restore dates', () => {
    const createdAt = new Date('2024-01-02T03:04:05.000Z');
    expect(encode(createdAt)).toBe('{"__type":"Date","value":"2024-01-02T03:04:05.000Z"}');

    const decoded = decode(encode({ createdAt }));
    expect(decoded).toEqual({ createdAt });
  });

  it('should tag and restore bigints', () => {
    expect(encode(10n)).toBe('{"__type":"BigInt","value":"10"}');
    expect(decode(encode({ balance: 12345678901234567890n }))).toEqual({ balance: 12345678901234567890n });
  });

  it('should wrap objects that carry their own __type key', () => {
    const payload = { __type: 'Date', value: 'not a date' };
    expect(encode(payload)).toBe('{"__type":"Object","value":{"__type":"Date","value":"not a date"}}');
    expect(decode(encode(payload))).toEqual(payload);
  });

  it('should drop undefined properties', () => {
    expect(decode(encode({ a: 1, b: undefined }))).toStrictEqual({ a: 1 });
  });

  it('should encode objects through toJSON', () => {
    class Money {
      constructor(private readonly cents: number) {}
      toJSON() {
        return { amount: this.cents / 100, currency: 'EUR' };
      }
    }
    expect(encode({ price: new Money(250) })).toBe('{"price":{"amount":2.5,"currency":"EUR"}}');
  });

  it('should allow the same object to appear twice', () => {
    const shared = { x: 1 };
    expect(encode({ a: shared, b: shared })).toBe('{"a":{"x":1},"b":{"x":1}}');
  });

  describe('non-representable values', () => {
    it('should reject functions with the offending path', () => {
      expect(() => encode({ fn: () => 1 })).toThrow(SerializationError);
      expect(() => encode({ fn: () => 1 })).toThrow('Value of type function is not serializable at $.fn');
    });

    it('should reject circular references', () => {
      const node: Record<string, unknown> = { name: 'root' };
      node.self = node;
      expect(() => encode(node)).toThrow('Circular reference at $.self');
    });

    it('should reject class instances without toJSON', () => {
      expect(() => encode({ m: new Map([['a', 1]]) })).toThrow('Instance of Map is not serializable at $.m');
    });

    it('should reject non-finite numbers', () => {
      expect(() => encode({ ratio: NaN })).toThrow(SerializationError);
      expect(() => encode([Infinity])).toThrow('Non-finite number Infinity at $[0]');
    });

    it('should reject undefined payloads and array items', () => {
      expect(() => encode(undefined)).toThrow('Undefined value at $');
      expect(() => encode([1, undefined])).toThrow('Undefined value at $[1]');
    });

    it('should reject symbols', () => {
      expect(() => encode({ s: Symbol('x') })).toThrow(SerializationError);
    });
  });

  describe('decode errors', () => {
    it('should reject malformed text', () => {
      expect(() => decode('{not json')).toThrow(SerializationError);
    });

    it('should reject unknown type tags', () => {
      expect(() => decode('{"__type":"Stream","value":"x"}')).toThrow('Unknown type tag "Stream"');
    });
  });
});

describe('encodeEntry/decodeEntry', () => {
  const entry = {
    payload: '{"id":1}',
    etag: 'W/"abc"',
    createdAt: 1700000000000,
    ttl: 3600,
  };

  it('should write a versioned envelope', () => {
    expect(JSON.parse(encodeEntry(entry))).toEqual({ v: 1, ...entry });
  });

  it('should read back the entry', () => {
    expect(decodeEntry(encodeEntry(entry))).toEqual(entry);
  });

  it('should reject malformed envelopes', () => {
    expect(() => decodeEntry('plain text')).toThrow('Malformed cache entry');
  });

  it('should reject envelopes failing validation', () => {
    const invalid = JSON.stringify({ v: 1, ...entry, ttl: 0 });
    expect(() => decodeEntry(invalid)).toThrow(SerializationError);
  });

  it('should reject envelopes of another version', () => {
    const future = JSON.stringify({ ...entry, v: 2 });
    expect(() => decodeEntry(future)).toThrow(SerializationError);
  });
});
