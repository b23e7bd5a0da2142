/**
 * 부트스트랩 스키마 ("스키마의 스키마")
 *
 * 파일마다 다른 스키마 blob을 읽기 위한 고정 정의 테이블.
 * 일반 데이터 디코더가 이 테이블로 스키마 blob을 한 번 읽고,
 * schema-decoder 가 그 결과를 Schema 로 구체화한다.
 *
 *   enum DefinitionKind { ENUM = 0; STRUCT = 1; MESSAGE = 2; }
 *   enum FieldModifier  { NONE = 0; ARRAY = 1; OPTIONAL = 2; }
 *   struct Field        { string name; int type; FieldModifier modifier; uint tag; }
 *   struct Definition   { string name; DefinitionKind kind; Field[] fields; }
 *   struct Schema       { Definition[] definitions; }
 */

import { Schema, type DefinitionKind, type FieldModifier, type TypeDef } from './types.js';

export const BOOTSTRAP_IDS = {
  DefinitionKind: 0,
  FieldModifier: 1,
  Field: 2,
  Definition: 3,
  Schema: 4,
} as const;

/** 부트스트랩 enum 값 ↔ 모델 값 */
export const DEFINITION_KINDS: readonly DefinitionKind[] = ['enum', 'struct', 'message'];
export const FIELD_MODIFIERS: readonly FieldModifier[] = ['none', 'array', 'optional'];

const member = (name: string, tag: number) =>
  ({ name, tag, type: { kind: 'scalar', scalar: 'uint' }, modifier: 'none' }) as const;

const DEFINITIONS: readonly TypeDef[] = [
  {
    id: BOOTSTRAP_IDS.DefinitionKind,
    name: 'DefinitionKind',
    kind: 'enum',
    fields: [member('ENUM', 0), member('STRUCT', 1), member('MESSAGE', 2)],
  },
  {
    id: BOOTSTRAP_IDS.FieldModifier,
    name: 'FieldModifier',
    kind: 'enum',
    fields: [member('NONE', 0), member('ARRAY', 1), member('OPTIONAL', 2)],
  },
  {
    id: BOOTSTRAP_IDS.Field,
    name: 'Field',
    kind: 'struct',
    fields: [
      { name: 'name', tag: 1, type: { kind: 'scalar', scalar: 'string' }, modifier: 'none' },
      { name: 'type', tag: 2, type: { kind: 'scalar', scalar: 'int' }, modifier: 'none' },
      { name: 'modifier', tag: 3, type: { kind: 'ref', typeId: BOOTSTRAP_IDS.FieldModifier }, modifier: 'none' },
      { name: 'tag', tag: 4, type: { kind: 'scalar', scalar: 'uint' }, modifier: 'none' },
    ],
  },
  {
    id: BOOTSTRAP_IDS.Definition,
    name: 'Definition',
    kind: 'struct',
    fields: [
      { name: 'name', tag: 1, type: { kind: 'scalar', scalar: 'string' }, modifier: 'none' },
      { name: 'kind', tag: 2, type: { kind: 'ref', typeId: BOOTSTRAP_IDS.DefinitionKind }, modifier: 'none' },
      { name: 'fields', tag: 3, type: { kind: 'ref', typeId: BOOTSTRAP_IDS.Field }, modifier: 'array' },
    ],
  },
  {
    id: BOOTSTRAP_IDS.Schema,
    name: 'Schema',
    kind: 'struct',
    fields: [
      { name: 'definitions', tag: 1, type: { kind: 'ref', typeId: BOOTSTRAP_IDS.Definition }, modifier: 'array' },
    ],
  },
];

export const BOOTSTRAP_SCHEMA = new Schema(DEFINITIONS);
