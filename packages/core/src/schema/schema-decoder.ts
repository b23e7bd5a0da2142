/**
 * 스키마 디코더
 *
 * 스키마 blob 을 부트스트랩 스키마로 한 번 디코드한 뒤 Schema 로 구체화한다.
 * 기본형 읽기 루틴은 데이터 디코더와 공유한다.
 * 어떤 구조 위반이든 MALFORMED_SCHEMA 로 보고된다.
 */

import { ByteReader } from '../binary/byte-reader.js';
import { decodeRoot } from '../decoder/data-decoder.js';
import { encodeValue, type PlainRecord } from '../decoder/data-encoder.js';
import { fieldNumber, fieldRecords, fieldString, type RecordValue } from '../decoder/value.js';
import { formatFigJsonError, isDecodeError, type DecodeError } from '../utils/errors.js';
import { BOOTSTRAP_IDS, BOOTSTRAP_SCHEMA, DEFINITION_KINDS, FIELD_MODIFIERS } from './bootstrap.js';
import { Schema, scalarFromCode, typeRefCode, type FieldDef, type TypeDef, type TypeRef } from './types.js';
import { validateSchema } from './validate.js';

export function decodeSchema(bytes: Uint8Array): Schema {
  const reader = new ByteReader(bytes);

  let root: RecordValue;
  try {
    root = decodeRoot(BOOTSTRAP_SCHEMA, reader, BOOTSTRAP_IDS.Schema);
  } catch (err) {
    throw toMalformed(err);
  }

  if (reader.remaining !== 0) {
    const err: DecodeError = {
      code: 'MALFORMED_SCHEMA',
      reason: `스키마 뒤에 ${reader.remaining}바이트가 남음`,
      offset: reader.offset,
    };
    throw err;
  }

  const definitions = fieldRecords(root, 'definitions').map(materializeDefinition);
  validateSchema(definitions);
  return new Schema(definitions);
}

/** decodeSchema 의 역방향 */
export function encodeSchema(schema: Schema): Uint8Array {
  const plain: PlainRecord = {
    definitions: schema.definitions.map(def => ({
      name: def.name,
      kind: DEFINITION_KINDS.indexOf(def.kind),
      fields: def.fields.map(field => ({
        name: field.name,
        type: typeRefCode(field.type),
        modifier: FIELD_MODIFIERS.indexOf(field.modifier),
        tag: field.tag,
      })),
    })),
  };
  return encodeValue(BOOTSTRAP_SCHEMA, BOOTSTRAP_IDS.Schema, plain);
}

// ─── 구체화 ───────────────────────────────────────────────────────────────────

function malformed(reason: string, definition: string): DecodeError {
  return { code: 'MALFORMED_SCHEMA', reason, definition };
}

function materializeDefinition(record: RecordValue, id: number): TypeDef {
  const name = fieldString(record, 'name') ?? '';
  const kindValue = fieldNumber(record, 'kind') ?? -1;
  const kind = DEFINITION_KINDS[kindValue];
  if (kind === undefined) {
    throw malformed(`잘못된 정의 종류 ${kindValue}`, name);
  }

  const fields = fieldRecords(record, 'fields').map((field): FieldDef => {
    const fieldName = fieldString(field, 'name') ?? '';
    const modifierValue = fieldNumber(field, 'modifier') ?? -1;
    const modifier = FIELD_MODIFIERS[modifierValue];
    if (modifier === undefined) {
      throw malformed(`잘못된 필드 modifier ${modifierValue} (${fieldName})`, name);
    }
    return {
      name: fieldName,
      tag: fieldNumber(field, 'tag') ?? 0,
      type: materializeTypeRef(fieldNumber(field, 'type') ?? 0, fieldName, name),
      modifier,
    };
  });

  return { id, name, kind, fields };
}

function materializeTypeRef(code: number, fieldName: string, definition: string): TypeRef {
  if (code >= 0) return { kind: 'ref', typeId: code };
  const scalar = scalarFromCode(code);
  if (scalar === undefined) {
    throw malformed(`알 수 없는 스칼라 코드 ${code} (${fieldName})`, definition);
  }
  return { kind: 'scalar', scalar };
}

/** 부트스트랩 디코드 중의 에러를 MALFORMED_SCHEMA 로 */
function toMalformed(err: unknown): unknown {
  if (!isDecodeError(err)) return err;
  const reason = formatFigJsonError(err);
  return 'offset' in err && err.offset !== undefined
    ? { code: 'MALFORMED_SCHEMA', reason, offset: err.offset }
    : { code: 'MALFORMED_SCHEMA', reason };
}
