/**
 * 테스트 공용 픽스처
 * 디자인 문서 형태의 스키마와 인코드 → 디코드 도우미
 */

import { decodeValue } from '../decoder/data-decoder.js';
import { encodeValue, type PlainRecord } from '../decoder/data-encoder.js';
import type { RecordValue } from '../decoder/value.js';
import { defineSchema } from '../schema/define.js';
import { emptyNode, type DesignNode } from '../tree/node.js';

export const DESIGN_SCHEMA = defineSchema([
  { name: 'NodeType', kind: 'enum', members: { DOCUMENT: 0, CANVAS: 1, FRAME: 2, TEXT: 3, VECTOR: 4, CUSTOM_THING: 5 } },
  { name: 'BlendMode', kind: 'enum', members: { NORMAL: 0, MULTIPLY: 1 } },
  {
    name: 'GUID',
    kind: 'struct',
    fields: [
      { name: 'sessionID', tag: 1, type: 'uint' },
      { name: 'localID', tag: 2, type: 'uint' },
    ],
  },
  {
    name: 'ParentIndex',
    kind: 'struct',
    fields: [
      { name: 'guid', tag: 1, type: 'GUID' },
      { name: 'position', tag: 2, type: 'string' },
    ],
  },
  {
    name: 'Vector',
    kind: 'struct',
    fields: [
      { name: 'x', tag: 1, type: 'float' },
      { name: 'y', tag: 2, type: 'float' },
    ],
  },
  {
    name: 'Image',
    kind: 'message',
    fields: [
      { name: 'hash', tag: 1, type: 'byte', modifier: 'array' },
      { name: 'name', tag: 2, type: 'string' },
    ],
  },
  {
    name: 'Paint',
    kind: 'message',
    fields: [
      { name: 'type', tag: 1, type: 'string' },
      { name: 'opacity', tag: 2, type: 'float' },
      { name: 'visible', tag: 3, type: 'bool' },
      { name: 'image', tag: 4, type: 'Image' },
    ],
  },
  { name: 'EditInfo', kind: 'message', fields: [{ name: 'lastEditedAt', tag: 1, type: 'uint' }] },
  {
    name: 'NodeChange',
    kind: 'message',
    fields: [
      { name: 'guid', tag: 1, type: 'GUID' },
      { name: 'parentIndex', tag: 2, type: 'ParentIndex' },
      { name: 'type', tag: 3, type: 'NodeType' },
      { name: 'name', tag: 4, type: 'string' },
      { name: 'visible', tag: 5, type: 'bool' },
      { name: 'opacity', tag: 6, type: 'float' },
      { name: 'blendMode', tag: 7, type: 'BlendMode' },
      { name: 'size', tag: 8, type: 'Vector' },
      { name: 'fillPaints', tag: 9, type: 'Paint', modifier: 'array' },
      { name: 'commandsBlob', tag: 10, type: 'uint' },
      { name: 'vectorNetworkBlob', tag: 11, type: 'uint' },
      { name: 'internalOnly', tag: 12, type: 'bool' },
      { name: 'editInfo', tag: 13, type: 'EditInfo' },
      { name: 'fontSize', tag: 14, type: 'float' },
      { name: 'stackMode', tag: 15, type: 'string' },
      { name: 'children', tag: 16, type: 'NodeChange', modifier: 'array' },
    ],
  },
  { name: 'Blob', kind: 'message', fields: [{ name: 'bytes', tag: 1, type: 'bytes' }] },
  {
    name: 'Message',
    kind: 'message',
    fields: [
      { name: 'type', tag: 1, type: 'string' },
      { name: 'sessionID', tag: 2, type: 'uint' },
      { name: 'nodeChanges', tag: 3, type: 'NodeChange', modifier: 'array' },
      { name: 'blobs', tag: 4, type: 'Blob', modifier: 'array' },
    ],
  },
]);

/** 평범한 객체를 한 번 인코드 / 디코드해 제네릭 레코드로 */
export function record(typeName: 'NodeChange' | 'Message', plain: PlainRecord): RecordValue {
  const def = DESIGN_SCHEMA.typeByName(typeName);
  if (def === undefined) throw new Error(`정의 없음: ${typeName}`);
  return decodeValue(DESIGN_SCHEMA, encodeValue(DESIGN_SCHEMA, def.id, plain), def.id);
}

export function guid(sessionID: number, localID: number): PlainRecord {
  return { sessionID, localID };
}

/** float32 little-endian 바이트 */
export function f32(...values: number[]): number[] {
  const bytes = new Uint8Array(values.length * 4);
  const view = new DataView(bytes.buffer);
  values.forEach((value, i) => view.setFloat32(i * 4, value, true));
  return [...bytes];
}

export function u32(...values: number[]): number[] {
  const bytes = new Uint8Array(values.length * 4);
  const view = new DataView(bytes.buffer);
  values.forEach((value, i) => view.setUint32(i * 4, value, true));
  return [...bytes];
}

/** 패스 테스트용 노드 */
export function makeNode(key: number, overrides: Partial<DesignNode> = {}): DesignNode {
  return { ...emptyNode(key), opaque: false, type: 'FRAME', ...overrides };
}

/** 매직 헤더 + 버전 + [길이, 청크]* */
export function figFile(chunks: readonly Uint8Array[], header = 'fig-kiwi', version = 101): Uint8Array {
  const parts = [Uint8Array.from(header, c => c.charCodeAt(0)), Uint8Array.from(u32(version))];
  for (const chunk of chunks) parts.push(Uint8Array.from(u32(chunk.length)), chunk);
  const out = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/** throw 된 값 (에러 객체는 Error 가 아니므로 toThrow 대신 쓴다) */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('throw 되지 않음');
}
