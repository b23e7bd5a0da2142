import { describe, it, expect } from 'vitest';
import { ByteReader } from '../../binary/byte-reader.js';
import { ByteWriter } from '../../binary/byte-writer.js';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('throw 되지 않음');
}

describe('ByteReader varuint', () => {
  it('reads multi-byte LEB128', () => {
    expect(new ByteReader(Uint8Array.of(0x96, 0x01)).readVarUint()).toBe(150);
  });

  it('reads the full uint32 range in 5 bytes', () => {
    const reader = new ByteReader(Uint8Array.of(0xff, 0xff, 0xff, 0xff, 0x0f));
    expect(reader.readVarUint()).toBe(4294967295);
    expect(reader.remaining).toBe(0);
  });

  it('rejects a varuint longer than 5 bytes', () => {
    const err = thrown(() => new ByteReader(Uint8Array.of(0x80, 0x80, 0x80, 0x80, 0x80, 0x01)).readVarUint());
    expect(err).toMatchObject({ code: 'TYPE_MISMATCH', offset: 0 });
  });

  it('rejects a 5-byte varuint above the uint32 range', () => {
    const max = thrown(() => new ByteReader(Uint8Array.of(0xff, 0xff, 0xff, 0xff, 0x1f)).readVarUint());
    expect(max).toEqual({ code: 'TYPE_MISMATCH', offset: 0, reason: 'varuint가 uint32 범위를 넘음' });
    const wrapped = thrown(() => new ByteReader(Uint8Array.of(0x80, 0x80, 0x80, 0x80, 0x10)).readVarUint());
    expect(wrapped).toMatchObject({ code: 'TYPE_MISMATCH', offset: 0 });
  });

  it('rejects an oversized varint at its own offset', () => {
    const reader = new ByteReader(Uint8Array.of(0x00, 0xff, 0xff, 0xff, 0xff, 0x7f));
    expect(reader.readVarInt()).toBe(0);
    expect(thrown(() => reader.readVarInt())).toMatchObject({ code: 'TYPE_MISMATCH', offset: 1 });
  });

  it('reports truncation with offset', () => {
    const err = thrown(() => new ByteReader(Uint8Array.of(0x80)).readVarUint());
    expect(err).toEqual({ code: 'TRUNCATED_STREAM', offset: 1, needed: 1, available: 0 });
  });

  it('decodes zig-zag varint', () => {
    const reader = new ByteReader(Uint8Array.of(0x00, 0x01, 0x02, 0x03));
    expect([reader.readVarInt(), reader.readVarInt(), reader.readVarInt(), reader.readVarInt()]).toEqual([0, -1, 1, -2]);
  });
});

describe('ByteReader fixed width', () => {
  it('reads float32 little-endian', () => {
    expect(new ByteReader(Uint8Array.of(0x00, 0x00, 0xc0, 0x3f)).readFloat32()).toBe(1.5);
  });

  it('fails on a short float64', () => {
    const err = thrown(() => new ByteReader(new Uint8Array(7)).readFloat64());
    expect(err).toEqual({ code: 'TRUNCATED_STREAM', offset: 0, needed: 8, available: 7 });
  });
});

describe('ByteReader strings', () => {
  it('reads a length-prefixed UTF-8 string', () => {
    const writer = new ByteWriter();
    writer.writeString('한글');
    const bytes = writer.toUint8Array();
    expect(bytes[0]).toBe(6);
    expect(new ByteReader(bytes).readString()).toBe('한글');
  });

  it('rejects invalid UTF-8', () => {
    const err = thrown(() => new ByteReader(Uint8Array.of(0x01, 0xff)).readString());
    expect(err).toMatchObject({ code: 'TYPE_MISMATCH', offset: 1 });
  });

  it('reports truncation inside a string body', () => {
    const err = thrown(() => new ByteReader(Uint8Array.of(0x03, 0x61)).readString());
    expect(err).toEqual({ code: 'TRUNCATED_STREAM', offset: 1, needed: 3, available: 1 });
  });
});

describe('ByteReader sub-readers', () => {
  it('keeps absolute offsets inside a length-prefixed slice', () => {
    const reader = new ByteReader(Uint8Array.of(0x03, 0x0a, 0x0b, 0x0c, 0x09));
    const sub = reader.readLengthPrefixed();
    expect(sub.offset).toBe(1);
    expect(sub.readByte()).toBe(0x0a);
    sub.skip(2);
    expect(thrown(() => sub.readByte())).toMatchObject({ code: 'TRUNCATED_STREAM', offset: 4 });
    expect(reader.readByte()).toBe(0x09);
  });
});

describe('ByteWriter', () => {
  it('writes LEB128', () => {
    const writer = new ByteWriter();
    writer.writeVarUint(300);
    expect([...writer.toUint8Array()]).toEqual([0xac, 0x02]);
  });

  it('grows past the initial buffer', () => {
    const writer = new ByteWriter();
    for (let i = 0; i < 300; i++) writer.writeByte(i);
    const bytes = writer.toUint8Array();
    expect(bytes.length).toBe(300);
    expect(bytes[299]).toBe(299 & 0xff);
  });

  it('round-trips 64-bit extremes', () => {
    const writer = new ByteWriter();
    writer.writeVarInt64(-(2n ** 63n));
    writer.writeVarUint64(2n ** 64n - 1n);
    const bytes = writer.toUint8Array();
    expect(bytes.length).toBe(20);

    const reader = new ByteReader(bytes);
    expect(reader.readVarInt64()).toBe(-(2n ** 63n));
    expect(reader.readVarUint64()).toBe(2n ** 64n - 1n);
  });

  it('round-trips negative varint', () => {
    const writer = new ByteWriter();
    writer.writeVarInt(-12345);
    expect(new ByteReader(writer.toUint8Array()).readVarInt()).toBe(-12345);
  });
});
