/**
 * 메시지 필드 와이어 종류
 *
 * 메시지 필드 키 = tag * 8 + wireKind.
 * 와이어 종류만 알면 스키마에 없는 필드도 길이를 계산해 건너뛸 수 있다.
 */

import type { ByteReader } from '../binary/byte-reader.js';
import type { FieldDef, Schema } from '../schema/types.js';

export const WireKind = {
  VARINT: 0,
  FIXED8: 1,
  FIXED32: 2,
  FIXED64: 3,
  LENGTH_DELIMITED: 4,
} as const;

export type WireKind = (typeof WireKind)[keyof typeof WireKind];

export function isWireKind(value: number): value is WireKind {
  return value >= WireKind.VARINT && value <= WireKind.LENGTH_DELIMITED;
}

export function fieldKey(tag: number, wireKind: WireKind): number {
  return tag * 8 + wireKind;
}

export function splitFieldKey(key: number): { tag: number; wireKind: number } {
  return { tag: key >>> 3, wireKind: key & 7 };
}

/** 선언된 필드 타입이 요구하는 와이어 종류 */
export function wireKindOf(schema: Schema, field: FieldDef): WireKind {
  if (field.modifier === 'array') return WireKind.LENGTH_DELIMITED;

  if (field.type.kind === 'ref') {
    const target = schema.typeDef(field.type.typeId);
    return target?.kind === 'enum' ? WireKind.VARINT : WireKind.LENGTH_DELIMITED;
  }

  switch (field.type.scalar) {
    case 'int':
    case 'uint':
    case 'int64':
    case 'uint64':
      return WireKind.VARINT;
    case 'bool':
    case 'byte':
      return WireKind.FIXED8;
    case 'float':
      return WireKind.FIXED32;
    case 'double':
      return WireKind.FIXED64;
    case 'string':
    case 'bytes':
      return WireKind.LENGTH_DELIMITED;
  }
}

/**
 * 값이 바깥 varuint 길이 접두사로 감싸지는지.
 * LENGTH_DELIMITED 중 배열 / struct / message 만. string / bytes 는 자체 길이 접두사가 곧 그 구간이다.
 */
export function isWrapped(schema: Schema, field: FieldDef): boolean {
  if (wireKindOf(schema, field) !== WireKind.LENGTH_DELIMITED) return false;
  return field.modifier === 'array' || field.type.kind === 'ref';
}

/** 와이어 종류만으로 값 하나를 건너뛴다 */
export function skipWireValue(reader: ByteReader, wireKind: WireKind): void {
  switch (wireKind) {
    case WireKind.VARINT:
      reader.readVarUint64();
      return;
    case WireKind.FIXED8:
      reader.skip(1);
      return;
    case WireKind.FIXED32:
      reader.skip(4);
      return;
    case WireKind.FIXED64:
      reader.skip(8);
      return;
    case WireKind.LENGTH_DELIMITED:
      reader.readLengthPrefixed();
      return;
  }
}
