/**
 * 출력 트리 구체화
 *
 * valueToOutput — 제네릭 타입 트리 → JSON 값 (raw 출력. 필드 이름 그대로, 패스 없음)
 * nodeToOutput  — DesignNode → JSON 객체 (변환 출력)
 *
 * 결과는 스키마나 제네릭 트리 객체를 참조하지 않는다.
 *   enum       → 멤버 이름
 *   bytes      → base64 문자열
 *   큰 int64   → 10진 문자열
 *   NaN / ±Inf → null
 */

import { Buffer } from 'node:buffer';
import type { RecordValue, Value } from '../decoder/value.js';
import { FIELD_GROUPS, type DesignNode } from '../tree/node.js';
import type { OutputObject, OutputValue } from './types.js';

export function valueToOutput(value: Value): OutputValue {
  switch (value.kind) {
    case 'null':
      return null;
    case 'bool':
      return value.value;
    case 'int':
      return typeof value.value === 'bigint' ? value.value.toString() : value.value;
    case 'float':
      return Number.isFinite(value.value) ? value.value : null;
    case 'string':
      return value.value;
    case 'bytes':
      return Buffer.from(value.value).toString('base64');
    case 'enum':
      return value.name;
    case 'array':
      return value.items.map(valueToOutput);
    case 'record':
      return recordToOutput(value);
  }
}

export function recordToOutput(record: RecordValue): OutputObject {
  const object: OutputObject = {};
  for (const [name, field] of record.fields) object[name] = valueToOutput(field);
  return object;
}

/**
 * 키 순서: id, type, internalOnly, properties…, geometry…, layout…, style…, text…, extras, children
 * 비어 있는 children 은 생략
 */
export function nodeToOutput(node: DesignNode): OutputObject {
  const out: OutputObject = {};
  if (node.id !== null) out['id'] = node.id;
  if (node.type !== null) out['type'] = node.type;
  if (node.internalOnly) out['internalOnly'] = true;
  for (const group of FIELD_GROUPS) {
    Object.assign(out, node[group]);
  }
  if (node.extras !== null && Object.keys(node.extras).length > 0) out['extras'] = node.extras;
  if (node.children.length > 0) out['children'] = node.children.map(nodeToOutput);
  return out;
}
