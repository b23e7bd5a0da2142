/**
 * blob 파서
 *
 * 루트 메시지의 blobs[] 에 든 바이트열을 읽을 수 있는 구조로 바꾼다.
 * 형식이 맞지 않으면 null: 호출자는 원래 인덱스 필드를 그대로 둔다.
 *
 * commands      : [opcode u8, f32 LE 좌표...]*
 *                 0 Z / 1 M x y / 2 L x y / 3 Q cx cy x y / 4 C cx1 cy1 cx2 cy2 x y
 * vectorNetwork : u32 vertexCount, segmentCount, regionCount
 *                 vertex  = u32 styleID, f32 x, f32 y
 *                 segment = u32 styleID, u32 startVertex, f32 dx, f32 dy, u32 endVertex, f32 dx, f32 dy
 *                 region  = u32 (styleID << 1 | windingRule), u32 loopCount,
 *                           loop = u32 indexCount, u32 segment index...
 */

import type { OutputObject, OutputValue } from '../output/types.js';

const COMMAND_ARITY: ReadonlyMap<number, readonly [string, number]> = new Map<number, readonly [string, number]>([
  [0, ['Z', 0]],
  [1, ['M', 2]],
  [2, ['L', 2]],
  [3, ['Q', 4]],
  [4, ['C', 6]],
]);

/** 비유한 float 는 JSON 으로 표현할 수 없으므로 null */
function jsonNumber(value: number): number | null {
  return Number.isFinite(value) ? value : null;
}

class BlobCursor {
  private readonly view: DataView;
  offset = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  has(length: number): boolean {
    return this.offset + length <= this.bytes.length;
  }

  get done(): boolean {
    return this.offset >= this.bytes.length;
  }

  u8(): number {
    return this.view.getUint8(this.offset++);
  }

  u32(): number {
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  f32(): number | null {
    const value = this.view.getFloat32(this.offset, true);
    this.offset += 4;
    return jsonNumber(value);
  }
}

export function parseCommands(bytes: Uint8Array): OutputValue[] | null {
  const cursor = new BlobCursor(bytes);
  const commands: OutputValue[] = [];

  while (!cursor.done) {
    const command = COMMAND_ARITY.get(cursor.u8());
    if (command === undefined) return null;
    const [letter, arity] = command;
    if (!cursor.has(arity * 4)) return null;
    commands.push(letter);
    for (let i = 0; i < arity; i++) commands.push(cursor.f32());
  }
  return commands;
}

export function parseVectorNetwork(bytes: Uint8Array): OutputObject | null {
  const cursor = new BlobCursor(bytes);
  if (!cursor.has(12)) return null;
  const vertexCount = cursor.u32();
  const segmentCount = cursor.u32();
  const regionCount = cursor.u32();

  const vertices: OutputValue[] = [];
  for (let i = 0; i < vertexCount; i++) {
    if (!cursor.has(12)) return null;
    vertices.push({ styleID: cursor.u32(), x: cursor.f32(), y: cursor.f32() });
  }

  const segments: OutputValue[] = [];
  for (let i = 0; i < segmentCount; i++) {
    if (!cursor.has(28)) return null;
    const styleID = cursor.u32();
    const start = { vertex: cursor.u32(), dx: cursor.f32(), dy: cursor.f32() };
    const end = { vertex: cursor.u32(), dx: cursor.f32(), dy: cursor.f32() };
    if (start.vertex >= vertexCount || end.vertex >= vertexCount) return null;
    segments.push({ styleID, start, end });
  }

  const regions: OutputValue[] = [];
  for (let i = 0; i < regionCount; i++) {
    if (!cursor.has(8)) return null;
    const styleAndRule = cursor.u32();
    const loopCount = cursor.u32();
    const loops: OutputValue[] = [];
    for (let l = 0; l < loopCount; l++) {
      if (!cursor.has(4)) return null;
      const indexCount = cursor.u32();
      if (!cursor.has(indexCount * 4)) return null;
      const indices: OutputValue[] = [];
      for (let s = 0; s < indexCount; s++) {
        const segment = cursor.u32();
        if (segment >= segmentCount) return null;
        indices.push(segment);
      }
      loops.push({ segments: indices });
    }
    regions.push({
      styleID: styleAndRule >>> 1,
      windingRule: (styleAndRule & 1) !== 0 ? 'NONZERO' : 'ODD',
      loops,
    });
  }

  return { vertices, segments, regions };
}

/** 알려진 blob 종류만. 모르는 종류는 null */
export function parseBlob(kind: string, bytes: Uint8Array): OutputValue | null {
  switch (kind) {
    case 'commands':
      return parseCommands(bytes);
    case 'vectorNetwork':
      return parseVectorNetwork(bytes);
    default:
      return null;
  }
}
