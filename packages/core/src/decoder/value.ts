/**
 * 제네릭 타입 트리 (디코드 결과)
 *
 * 닫힌 태그드 유니언. 모든 분기는 `kind` 에 대한 switch 로 한다.
 * 각 값은 자식을 독점 소유하므로 데이터 인스턴스는 항상 유한한 트리다.
 */

import type { TypeId } from '../schema/types.js';

export type Value =
  | NullValue
  | { kind: 'bool'; value: boolean }
  | { kind: 'int'; value: number | bigint }
  | { kind: 'float'; value: number; precision: 32 | 64 }
  | { kind: 'string'; value: string }
  | { kind: 'bytes'; value: Uint8Array }
  | EnumValue
  | ArrayValue
  | RecordValue;

export interface NullValue {
  kind: 'null';
}

/** 선언된 멤버에 해당하는 enum 값. 범위 밖 값은 int 로 남는다 */
export interface EnumValue {
  kind: 'enum';
  typeName: string;
  value: number;
  name: string;
}

export interface ArrayValue {
  kind: 'array';
  items: Value[];
}

export interface RecordValue {
  kind: 'record';
  typeId: TypeId;
  typeName: string;
  /** 필드 이름 → 값. 스트림에 처음 나타난 순서 (struct는 선언 순서) */
  fields: Map<string, Value>;
}

export const NULL_VALUE: NullValue = { kind: 'null' };

export function isRecord(value: Value | undefined): value is RecordValue {
  return value?.kind === 'record';
}

/** int64 / uint64: 안전 정수 범위면 number, 아니면 bigint 그대로 */
export function intFromBigInt(value: bigint): number | bigint {
  return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
    ? Number(value)
    : value;
}

// ─── 레코드 필드 접근 ──────────────────────────────────────────────────────────

export function fieldString(record: RecordValue, name: string): string | undefined {
  const value = record.fields.get(name);
  if (value?.kind === 'string') return value.value;
  if (value?.kind === 'enum') return value.name;
  return undefined;
}

/** int / enum 값을 number 로. bigint 는 안전 범위 밖이므로 undefined */
export function fieldNumber(record: RecordValue, name: string): number | undefined {
  const value = record.fields.get(name);
  if (value?.kind === 'int' && typeof value.value === 'number') return value.value;
  if (value?.kind === 'enum' || value?.kind === 'float') return value.value;
  return undefined;
}

export function fieldRecords(record: RecordValue, name: string): RecordValue[] {
  const value = record.fields.get(name);
  if (value?.kind !== 'array') return [];
  return value.items.filter(isRecord);
}
