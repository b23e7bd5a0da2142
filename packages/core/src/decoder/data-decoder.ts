/**
 * 데이터 디코더
 *
 * Schema + 데이터 blob + 루트 TypeId → 제네릭 타입 트리 (RecordValue)
 *
 * - struct : 선언된 필드를 선언 순서대로. OPTIONAL 필드는 존재 여부 bool 이 먼저 온다
 * - message: varuint 필드 수, 이어서 (key, value) 쌍. key = tag * 8 + wireKind
 *   · 스키마에 없는 태그 → 와이어 종류로 길이를 계산해 건너뜀 (onUnknownField 로 보고)
 *   · 예약된 와이어 종류(5~7)의 미지 태그 → UNKNOWN_TAG
 *   · 알려진 태그의 와이어 종류 불일치 → TYPE_MISMATCH
 *   · 같은 태그가 두 번 나오면 마지막 값
 * - 범위 밖 enum 값은 int 로 보존
 * - 끝을 넘는 읽기는 어디서든 TRUNCATED_STREAM. 부분 트리는 돌려주지 않는다
 *
 * 건너뛴 필드의 바이트는 보관하지 않는다. raw 출력은 스키마가 아는 필드로 한정된다.
 */

import { ByteReader } from '../binary/byte-reader.js';
import { withDecodeContext, type DecodeError } from '../utils/errors.js';
import type { FieldDef, ScalarKind, Schema, TypeDef, TypeId, TypeRef } from '../schema/types.js';
import {
  NULL_VALUE,
  intFromBigInt,
  type RecordValue,
  type Value,
} from './value.js';
import { isWireKind, isWrapped, skipWireValue, splitFieldKey, wireKindOf } from './wire.js';

export const DEFAULT_MAX_DEPTH = 512;

/** 바이트를 차지하지 않는 빈 struct 원소 배열의 길이 한도 */
export const MAX_EMPTY_STRUCT_ELEMENTS = 65536;

/** 건너뛴 미지 필드 정보 */
export interface UnknownField {
  typeName: string;
  tag: number;
  wireKind: number;
  /** 키를 제외한 값 부분의 바이트 수 */
  byteLength: number;
  /** 필드 키의 위치 */
  offset: number;
}

export interface DecodeOptions {
  /** record 중첩 한도. 넘으면 TYPE_MISMATCH */
  maxDepth?: number;
  onUnknownField?: (field: UnknownField) => void;
}

// ─── 공개 API ─────────────────────────────────────────────────────────────────

export function decodeValue(
  schema: Schema,
  bytes: Uint8Array,
  rootTypeId: TypeId,
  options: DecodeOptions = {},
): RecordValue {
  return decodeRoot(schema, new ByteReader(bytes), rootTypeId, options);
}

/**
 * 이미 위치가 잡힌 리더에서 루트 레코드 하나를 읽는다.
 * 뒤에 남는 바이트는 호출자가 판단한다.
 */
export function decodeRoot(
  schema: Schema,
  reader: ByteReader,
  rootTypeId: TypeId,
  options: DecodeOptions = {},
): RecordValue {
  const root = schema.typeDef(rootTypeId);
  if (root === undefined || root.kind === 'enum') {
    const err: DecodeError = {
      code: 'UNKNOWN_ROOT_TYPE',
      root: rootTypeId,
      available: schema.size,
    };
    throw err;
  }
  return new DataDecoder(schema, options).decodeRecord(reader, root, 0);
}

/**
 * 루트 타입 선택
 *   1. 이름이 주어지면 그 정의 (struct / message)
 *   2. 'Message' 라는 이름의 message
 *   3. 마지막 message 정의
 */
export function findRootType(schema: Schema, name?: string): TypeId {
  if (name !== undefined) {
    const def = schema.typeByName(name);
    if (def === undefined || def.kind === 'enum') {
      const err: DecodeError = { code: 'UNKNOWN_ROOT_TYPE', root: name, available: schema.size };
      throw err;
    }
    return def.id;
  }

  const named = schema.typeByName('Message');
  if (named?.kind === 'message') return named.id;

  for (let id = schema.size - 1; id >= 0; id--) {
    if (schema.typeDef(id)?.kind === 'message') return id;
  }

  const err: DecodeError = { code: 'UNKNOWN_ROOT_TYPE', root: 'Message', available: schema.size };
  throw err;
}

// ─── 구현 ─────────────────────────────────────────────────────────────────────

class DataDecoder {
  private readonly maxDepth: number;

  constructor(
    private readonly schema: Schema,
    private readonly options: DecodeOptions,
  ) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  decodeRecord(reader: ByteReader, def: TypeDef, depth: number): RecordValue {
    if (depth > this.maxDepth) {
      const err: DecodeError = {
        code: 'TYPE_MISMATCH',
        offset: reader.offset,
        reason: `중첩 깊이 ${this.maxDepth} 초과`,
        typeName: def.name,
      };
      throw err;
    }
    const fields = new Map<string, Value>();
    if (def.kind === 'message') {
      this.decodeMessageFields(reader, def, depth, fields);
    } else {
      this.decodeStructFields(reader, def, depth, fields);
    }
    return { kind: 'record', typeId: def.id, typeName: def.name, fields };
  }

  private decodeStructFields(
    reader: ByteReader,
    def: TypeDef,
    depth: number,
    fields: Map<string, Value>,
  ): void {
    for (const field of def.fields) {
      try {
        if (field.modifier === 'optional' && !this.readBool(reader)) {
          fields.set(field.name, NULL_VALUE);
          continue;
        }
        fields.set(field.name, this.decodeField(reader, field, depth));
      } catch (err) {
        throw withDecodeContext(err, field.tag, def.name);
      }
    }
  }

  private decodeMessageFields(
    reader: ByteReader,
    def: TypeDef,
    depth: number,
    fields: Map<string, Value>,
  ): void {
    const count = this.withContext(def, () => reader.readVarUint());

    for (let i = 0; i < count; i++) {
      const keyOffset = reader.offset;
      const { tag, wireKind } = splitFieldKey(this.withContext(def, () => reader.readVarUint()));
      const field = this.schema.fieldByTag(def, tag);

      if (field === undefined) {
        this.skipUnknown(reader, def, tag, wireKind, keyOffset);
        continue;
      }

      try {
        const expected = wireKindOf(this.schema, field);
        if (wireKind !== expected) {
          const err: DecodeError = {
            code: 'TYPE_MISMATCH',
            offset: keyOffset,
            reason: `${field.name}: wire kind ${wireKind}, ${expected} 필요`,
          };
          throw err;
        }

        if (isWrapped(this.schema, field)) {
          const sub = reader.readLengthPrefixed();
          fields.set(field.name, this.decodeField(sub, field, depth));
          if (sub.remaining !== 0) {
            const err: DecodeError = {
              code: 'TYPE_MISMATCH',
              offset: sub.offset,
              reason: `${field.name}: 선언된 길이 중 ${sub.remaining}바이트가 남음`,
            };
            throw err;
          }
        } else {
          fields.set(field.name, this.decodeField(reader, field, depth));
        }
      } catch (err) {
        throw withDecodeContext(err, tag, def.name);
      }
    }
  }

  private withContext<T>(def: TypeDef, read: () => T): T {
    try {
      return read();
    } catch (err) {
      throw withDecodeContext(err, undefined, def.name);
    }
  }

  private skipUnknown(
    reader: ByteReader,
    def: TypeDef,
    tag: number,
    wireKind: number,
    keyOffset: number,
  ): void {
    if (!isWireKind(wireKind)) {
      const err: DecodeError = {
        code: 'UNKNOWN_TAG',
        offset: keyOffset,
        tag,
        wireKind,
        typeName: def.name,
      };
      throw err;
    }
    const start = reader.offset;
    try {
      skipWireValue(reader, wireKind);
    } catch (err) {
      throw withDecodeContext(err, tag, def.name);
    }
    this.options.onUnknownField?.({
      typeName: def.name,
      tag,
      wireKind,
      byteLength: reader.offset - start,
      offset: keyOffset,
    });
  }

  /** modifier 를 반영한 필드 값 (OPTIONAL 의 존재 바이트는 호출자가 처리) */
  private decodeField(reader: ByteReader, field: FieldDef, depth: number): Value {
    if (field.modifier !== 'array') return this.decodeSingle(reader, field.type, depth);

    const countOffset = reader.offset;
    const count = reader.readVarUint();
    if (this.isEmptyStruct(field.type)) {
      if (count > MAX_EMPTY_STRUCT_ELEMENTS) {
        const err: DecodeError = {
          code: 'TYPE_MISMATCH',
          offset: countOffset,
          reason: `빈 struct 배열 길이 ${count} 가 한도 ${MAX_EMPTY_STRUCT_ELEMENTS} 를 넘음`,
        };
        throw err;
      }
    } else if (count > reader.remaining) {
      // 원소마다 최소 1바이트
      const err: DecodeError = {
        code: 'TRUNCATED_STREAM',
        offset: countOffset,
        needed: count,
        available: reader.remaining,
      };
      throw err;
    }
    const items: Value[] = [];
    for (let i = 0; i < count; i++) {
      items.push(this.decodeSingle(reader, field.type, depth));
    }
    return { kind: 'array', items };
  }

  private decodeSingle(reader: ByteReader, type: TypeRef, depth: number): Value {
    if (type.kind === 'scalar') return this.decodeScalar(reader, type.scalar);

    const def = this.schema.typeDef(type.typeId);
    if (def === undefined) {
      const err: DecodeError = {
        code: 'TYPE_MISMATCH',
        offset: reader.offset,
        reason: `존재하지 않는 타입 참조 #${type.typeId}`,
      };
      throw err;
    }

    if (def.kind === 'enum') {
      const raw = reader.readVarUint();
      const member = this.schema.enumMember(def, raw);
      return member === undefined
        ? { kind: 'int', value: raw }
        : { kind: 'enum', typeName: def.name, value: raw, name: member.name };
    }

    return this.decodeRecord(reader, def, depth + 1);
  }

  private decodeScalar(reader: ByteReader, scalar: ScalarKind): Value {
    switch (scalar) {
      case 'bool':
        return { kind: 'bool', value: this.readBool(reader) };
      case 'byte':
        return { kind: 'int', value: reader.readByte() };
      case 'int':
        return { kind: 'int', value: reader.readVarInt() };
      case 'uint':
        return { kind: 'int', value: reader.readVarUint() };
      case 'int64':
        return { kind: 'int', value: intFromBigInt(reader.readVarInt64()) };
      case 'uint64':
        return { kind: 'int', value: intFromBigInt(reader.readVarUint64()) };
      case 'float':
        return { kind: 'float', value: reader.readFloat32(), precision: 32 };
      case 'double':
        return { kind: 'float', value: reader.readFloat64(), precision: 64 };
      case 'string':
        return { kind: 'string', value: reader.readString() };
      case 'bytes':
        return { kind: 'bytes', value: reader.readBytes(reader.readVarUint()) };
    }
  }

  private readBool(reader: ByteReader): boolean {
    const offset = reader.offset;
    const byte = reader.readByte();
    if (byte > 1) {
      const err: DecodeError = {
        code: 'TYPE_MISMATCH',
        offset,
        reason: `bool 값은 0 또는 1이어야 함 (${byte})`,
      };
      throw err;
    }
    return byte === 1;
  }

  private isEmptyStruct(type: TypeRef): boolean {
    if (type.kind !== 'ref') return false;
    const def = this.schema.typeDef(type.typeId);
    return def?.kind === 'struct' && def.fields.length === 0;
  }
}
