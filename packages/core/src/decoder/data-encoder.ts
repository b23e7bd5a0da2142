/**
 * 데이터 인코더 (디코더의 역방향)
 *
 * 평범한 JS 객체(필드 이름 → 값)를 스키마에 맞춰 바이너리로 쓴다.
 * 테스트 픽스처 합성과 encodeSchema 에서 사용한다.
 *
 * - message: null / undefined 필드는 생략. 필드는 선언 순서로 쓴다
 * - struct : 필수 필드 누락은 TYPE_MISMATCH. OPTIONAL 은 존재 바이트 0
 * - enum   : 멤버 이름(string) 또는 숫자 값
 * - int64 / uint64: number 또는 bigint
 */

import { ByteWriter } from '../binary/byte-writer.js';
import type { DecodeError } from '../utils/errors.js';
import type { FieldDef, ScalarKind, Schema, TypeDef, TypeId, TypeRef } from '../schema/types.js';
import { fieldKey, isWrapped, wireKindOf } from './wire.js';

export type PlainValue =
  | null
  | undefined
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | PlainValue[]
  | PlainRecord;

export interface PlainRecord {
  readonly [field: string]: PlainValue;
}

export function isPlainRecord(value: PlainValue): value is PlainRecord {
  return (
    value !== null &&
    typeof value === 'object' &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array)
  );
}

export function encodeValue(schema: Schema, typeId: TypeId, value: PlainRecord): Uint8Array {
  const def = schema.typeDef(typeId);
  if (def === undefined || def.kind === 'enum') {
    const err: DecodeError = { code: 'UNKNOWN_ROOT_TYPE', root: typeId, available: schema.size };
    throw err;
  }
  const writer = new ByteWriter();
  new DataEncoder(schema).encodeRecord(writer, def, value);
  return writer.toUint8Array();
}

function mismatch(writer: ByteWriter, reason: string, typeName?: string): DecodeError {
  return typeName === undefined
    ? { code: 'TYPE_MISMATCH', offset: writer.size, reason }
    : { code: 'TYPE_MISMATCH', offset: writer.size, reason, typeName };
}

class DataEncoder {
  constructor(private readonly schema: Schema) {}

  encodeRecord(writer: ByteWriter, def: TypeDef, value: PlainRecord): void {
    for (const name of Object.keys(value)) {
      if (this.schema.fieldByName(def, name) === undefined) {
        throw mismatch(writer, `정의되지 않은 필드: ${name}`, def.name);
      }
    }

    if (def.kind === 'struct') {
      for (const field of def.fields) {
        const fieldValue = value[field.name];
        if (field.modifier === 'optional') {
          if (fieldValue === null || fieldValue === undefined) {
            writer.writeByte(0);
            continue;
          }
          writer.writeByte(1);
        } else if (fieldValue === null || fieldValue === undefined) {
          throw mismatch(writer, `필수 필드 누락: ${field.name}`, def.name);
        }
        this.encodeField(writer, field, fieldValue);
      }
      return;
    }

    const present = def.fields.filter(f => value[f.name] !== null && value[f.name] !== undefined);
    writer.writeVarUint(present.length);
    for (const field of present) {
      const fieldValue = value[field.name];
      writer.writeVarUint(fieldKey(field.tag, wireKindOf(this.schema, field)));
      if (isWrapped(this.schema, field)) {
        const sub = new ByteWriter();
        this.encodeField(sub, field, fieldValue);
        writer.writeLengthPrefixed(sub.toUint8Array());
      } else {
        this.encodeField(writer, field, fieldValue);
      }
    }
  }

  private encodeField(writer: ByteWriter, field: FieldDef, value: PlainValue): void {
    if (field.modifier !== 'array') {
      this.encodeSingle(writer, field.type, value);
      return;
    }
    if (!Array.isArray(value)) {
      throw mismatch(writer, `${field.name}: 배열이 필요함`);
    }
    writer.writeVarUint(value.length);
    for (const item of value) this.encodeSingle(writer, field.type, item);
  }

  private encodeSingle(writer: ByteWriter, type: TypeRef, value: PlainValue): void {
    if (type.kind === 'scalar') {
      this.encodeScalar(writer, type.scalar, value);
      return;
    }

    const def = this.schema.typeDef(type.typeId);
    if (def === undefined) {
      throw mismatch(writer, `존재하지 않는 타입 참조 #${type.typeId}`);
    }

    if (def.kind === 'enum') {
      const member =
        typeof value === 'string'
          ? def.fields.find(f => f.name === value)
          : undefined;
      if (member !== undefined) {
        writer.writeVarUint(member.tag);
      } else if (typeof value === 'number') {
        writer.writeVarUint(value);
      } else {
        throw mismatch(writer, `enum 멤버가 아님: ${String(value)}`, def.name);
      }
      return;
    }

    if (!isPlainRecord(value)) {
      throw mismatch(writer, `${def.name} 객체가 필요함`, def.name);
    }
    this.encodeRecord(writer, def, value);
  }

  private encodeScalar(writer: ByteWriter, scalar: ScalarKind, value: PlainValue): void {
    switch (scalar) {
      case 'bool':
        if (typeof value !== 'boolean') break;
        writer.writeByte(value ? 1 : 0);
        return;
      case 'byte':
        if (typeof value !== 'number') break;
        writer.writeByte(value);
        return;
      case 'int':
        if (typeof value !== 'number') break;
        writer.writeVarInt(value);
        return;
      case 'uint':
        if (typeof value !== 'number') break;
        writer.writeVarUint(value);
        return;
      case 'int64':
        if (typeof value !== 'number' && typeof value !== 'bigint') break;
        writer.writeVarInt64(BigInt(value));
        return;
      case 'uint64':
        if (typeof value !== 'number' && typeof value !== 'bigint') break;
        writer.writeVarUint64(BigInt(value));
        return;
      case 'float':
        if (typeof value !== 'number') break;
        writer.writeFloat32(value);
        return;
      case 'double':
        if (typeof value !== 'number') break;
        writer.writeFloat64(value);
        return;
      case 'string':
        if (typeof value !== 'string') break;
        writer.writeString(value);
        return;
      case 'bytes':
        if (!(value instanceof Uint8Array)) break;
        writer.writeLengthPrefixed(value);
        return;
    }
    throw mismatch(writer, `${scalar} 값이 필요함: ${String(value)}`);
  }
}
