/**
 * byte-writer.ts
 * ByteReader의 역방향. 스키마 / 데이터 인코더가 사용
 */

const utf8 = new TextEncoder();

export class ByteWriter {
  private buffer = new Uint8Array(256);
  private length = 0;

  private grow(extra: number): void {
    const needed = this.length + extra;
    if (needed <= this.buffer.length) return;
    let size = this.buffer.length * 2;
    while (size < needed) size *= 2;
    const next = new Uint8Array(size);
    next.set(this.buffer.subarray(0, this.length));
    this.buffer = next;
  }

  get size(): number {
    return this.length;
  }

  writeByte(value: number): void {
    this.grow(1);
    this.buffer[this.length++] = value & 0xff;
  }

  writeVarUint(value: number): void {
    let v = value >>> 0;
    do {
      let byte = v & 0x7f;
      v >>>= 7;
      if (v !== 0) byte |= 0x80;
      this.writeByte(byte);
    } while (v !== 0);
  }

  writeVarInt(value: number): void {
    this.writeVarUint((value << 1) ^ (value >> 31));
  }

  writeVarUint64(value: bigint): void {
    let v = BigInt.asUintN(64, value);
    do {
      let byte = Number(v & 0x7fn);
      v >>= 7n;
      if (v !== 0n) byte |= 0x80;
      this.writeByte(byte);
    } while (v !== 0n);
  }

  writeVarInt64(value: bigint): void {
    const v = BigInt.asIntN(64, value);
    this.writeVarUint64((v << 1n) ^ (v >> 63n));
  }

  writeFloat32(value: number): void {
    this.grow(4);
    new DataView(this.buffer.buffer).setFloat32(this.length, value, true);
    this.length += 4;
  }

  writeFloat64(value: number): void {
    this.grow(8);
    new DataView(this.buffer.buffer).setFloat64(this.length, value, true);
    this.length += 8;
  }

  /** 길이 접두사 없이 그대로 */
  writeRaw(bytes: Uint8Array): void {
    this.grow(bytes.length);
    this.buffer.set(bytes, this.length);
    this.length += bytes.length;
  }

  /** varuint 길이 + 바이트 */
  writeLengthPrefixed(bytes: Uint8Array): void {
    this.writeVarUint(bytes.length);
    this.writeRaw(bytes);
  }

  writeString(value: string): void {
    this.writeLengthPrefixed(utf8.encode(value));
  }

  toUint8Array(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }
}
