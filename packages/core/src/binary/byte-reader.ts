/**
 * byte-reader.ts
 * 스키마 blob / 데이터 blob 공용 프리미티브 읽기 커서
 *
 * 인코딩 규칙 (DESIGN.md "와이어 포맷"):
 *   varuint   — LEB128, 최대 5바이트 (uint32)
 *   varint    — zig-zag + varuint
 *   varuint64 — LEB128, 최대 10바이트 → bigint
 *   float     — IEEE-754 binary32 little-endian
 *   double    — IEEE-754 binary64 little-endian
 *   string    — varuint 바이트 길이 + UTF-8
 *
 * 끝을 넘어서는 읽기는 항상 TRUNCATED_STREAM.
 * 서브 리더는 원본 blob 기준 절대 오프셋으로 에러를 보고한다.
 */

import type { DecodeError } from '../utils/errors.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

export class ByteReader {
  private readonly view: DataView;
  private pos = 0;

  /**
   * @param bytes 읽을 구간
   * @param base  원본 blob 안에서 이 구간이 시작하는 위치 (에러 오프셋 보정용)
   */
  constructor(
    readonly bytes: Uint8Array,
    private readonly base = 0,
  ) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  /** 원본 blob 기준 현재 위치 */
  get offset(): number {
    return this.base + this.pos;
  }

  get remaining(): number {
    return this.bytes.length - this.pos;
  }

  private ensure(needed: number): void {
    if (this.remaining < needed) {
      const err: DecodeError = {
        code: 'TRUNCATED_STREAM',
        offset: this.offset,
        needed,
        available: this.remaining,
      };
      throw err;
    }
  }

  readByte(): number {
    this.ensure(1);
    const value = this.view.getUint8(this.pos);
    this.pos += 1;
    return value;
  }

  readVarUint(): number {
    const start = this.offset;
    let result = 0;
    for (let shift = 0; shift < 28; shift += 7) {
      const byte = this.readByte();
      result |= (byte & 0x7f) << shift;
      if ((byte & 0x80) === 0) return result >>> 0;
    }
    // 다섯째 바이트에는 uint32 의 상위 4비트만 남는다
    const last = this.readByte();
    if (last > 0x0f) {
      const err: DecodeError = {
        code: 'TYPE_MISMATCH',
        offset: start,
        reason: 'varuint가 uint32 범위를 넘음',
      };
      throw err;
    }
    return (result >>> 0) + last * 2 ** 28;
  }

  readVarInt(): number {
    const value = this.readVarUint();
    return (value >>> 1) ^ -(value & 1);
  }

  readVarUint64(): bigint {
    const start = this.offset;
    let result = 0n;
    for (let shift = 0n; shift < 70n; shift += 7n) {
      const byte = this.readByte();
      result |= BigInt(byte & 0x7f) << shift;
      if ((byte & 0x80) === 0) return BigInt.asUintN(64, result);
    }
    const err: DecodeError = {
      code: 'TYPE_MISMATCH',
      offset: start,
      reason: 'varuint64가 10바이트를 넘음',
    };
    throw err;
  }

  readVarInt64(): bigint {
    const value = this.readVarUint64();
    return (value >> 1n) ^ -(value & 1n);
  }

  readFloat32(): number {
    this.ensure(4);
    const value = this.view.getFloat32(this.pos, true);
    this.pos += 4;
    return value;
  }

  readFloat64(): number {
    this.ensure(8);
    const value = this.view.getFloat64(this.pos, true);
    this.pos += 8;
    return value;
  }

  readBytes(length: number): Uint8Array {
    this.ensure(length);
    const slice = this.bytes.slice(this.pos, this.pos + length);
    this.pos += length;
    return slice;
  }

  readString(): string {
    const length = this.readVarUint();
    const start = this.offset;
    const raw = this.readBytes(length);
    try {
      return utf8.decode(raw);
    } catch {
      const err: DecodeError = {
        code: 'TYPE_MISMATCH',
        offset: start,
        reason: '올바르지 않은 UTF-8 문자열',
      };
      throw err;
    }
  }

  /** varuint 길이 접두사가 붙은 구간을 서브 리더로 잘라낸다 */
  readLengthPrefixed(): ByteReader {
    const length = this.readVarUint();
    this.ensure(length);
    const sub = new ByteReader(
      this.bytes.subarray(this.pos, this.pos + length),
      this.offset,
    );
    this.pos += length;
    return sub;
  }

  skip(length: number): void {
    this.ensure(length);
    this.pos += length;
  }
}
