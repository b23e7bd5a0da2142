/**
 * 스키마 구조 검증
 * decodeSchema / defineSchema 공용. 위반 시 MALFORMED_SCHEMA
 */

import type { DecodeError } from '../utils/errors.js';
import type { TypeDef } from './types.js';

/** 메시지 필드 키 = tag * 8 + wireKind 가 uint32 안에 들어가야 한다 */
export const MAX_FIELD_TAG = 0x1fffffff;

function malformed(reason: string, definition?: string): DecodeError {
  return definition === undefined
    ? { code: 'MALFORMED_SCHEMA', reason }
    : { code: 'MALFORMED_SCHEMA', reason, definition };
}

export function validateSchema(definitions: readonly TypeDef[]): void {
  const names = new Set<string>();

  definitions.forEach((def, index) => {
    if (def.id !== index) {
      throw malformed(`정의 id ${def.id}가 위치 ${index}와 다름`, def.name);
    }
    if (names.has(def.name)) {
      throw malformed(`정의 이름 중복: ${def.name}`, def.name);
    }
    names.add(def.name);

    const tags = new Set<number>();
    const fieldNames = new Set<string>();
    for (const field of def.fields) {
      if (tags.has(field.tag)) {
        throw malformed(`태그 중복: ${field.tag} (${field.name})`, def.name);
      }
      tags.add(field.tag);

      if (fieldNames.has(field.name)) {
        throw malformed(`필드 이름 중복: ${field.name}`, def.name);
      }
      fieldNames.add(field.name);

      if (!Number.isInteger(field.tag) || field.tag < 0 || field.tag > MAX_FIELD_TAG) {
        throw malformed(`태그 범위 밖: ${field.tag} (${field.name})`, def.name);
      }

      if (def.kind === 'enum') continue;

      if (field.type.kind === 'ref') {
        const target = field.type.typeId;
        if (!Number.isInteger(target) || target < 0 || target >= definitions.length) {
          throw malformed(`존재하지 않는 타입 참조 #${target} (${field.name})`, def.name);
        }
      }
    }
  });
}
