/**
 * 코드로 스키마 선언하기
 *
 * 필드 타입은 스칼라 이름('int', 'string', …) 또는 정의 이름으로 적는다.
 * 정의 이름은 선언 순서와 무관하게 해석되므로 자기 참조 / 전방 참조 모두 가능.
 *
 * @example
 * const schema = defineSchema([
 *   { name: 'Node', kind: 'message', fields: [
 *     { name: 'id', tag: 0, type: 'int' },
 *     { name: 'children', tag: 1, type: 'Node', modifier: 'array' },
 *   ] },
 * ]);
 */

import type { DecodeError } from '../utils/errors.js';
import { Schema, isScalarKind, type FieldDef, type FieldModifier, type TypeDef, type TypeRef } from './types.js';
import { validateSchema } from './validate.js';

export interface FieldSpec {
  name: string;
  tag: number;
  type: string;
  modifier?: FieldModifier;
}

export type DefinitionSpec =
  | { name: string; kind: 'enum'; members: Readonly<Record<string, number>> }
  | { name: string; kind: 'struct' | 'message'; fields: readonly FieldSpec[] };

export function defineSchema(specs: readonly DefinitionSpec[]): Schema {
  const ids = new Map<string, number>();
  specs.forEach((spec, index) => {
    if (!ids.has(spec.name)) ids.set(spec.name, index);
  });

  const resolveType = (type: string, owner: string): TypeRef => {
    if (isScalarKind(type)) return { kind: 'scalar', scalar: type };
    const typeId = ids.get(type);
    if (typeId === undefined) {
      const err: DecodeError = {
        code: 'MALFORMED_SCHEMA',
        reason: `알 수 없는 타입 이름: ${type}`,
        definition: owner,
      };
      throw err;
    }
    return { kind: 'ref', typeId };
  };

  const definitions = specs.map((spec, id): TypeDef => {
    if (spec.kind === 'enum') {
      const fields = Object.entries(spec.members).map(
        ([name, value]): FieldDef => ({
          name,
          tag: value,
          type: { kind: 'scalar', scalar: 'uint' },
          modifier: 'none',
        }),
      );
      return { id, name: spec.name, kind: 'enum', fields };
    }
    const fields = spec.fields.map(
      (field): FieldDef => ({
        name: field.name,
        tag: field.tag,
        type: resolveType(field.type, spec.name),
        modifier: field.modifier ?? 'none',
      }),
    );
    return { id, name: spec.name, kind: spec.kind, fields };
  });

  validateSchema(definitions);
  return new Schema(definitions);
}
