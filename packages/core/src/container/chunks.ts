/**
 * 청크 테이블
 *
 *   [0..8)   매직 헤더
 *   [8..12)  버전 (uint32 LE)
 *   이후     [uint32 LE 길이, 페이로드]*
 *
 * 청크 0 = 스키마, 청크 1 = 데이터, 그 뒤는 선택적
 */

import UZIP from 'uzip';
import type { ContainerError } from '../utils/errors.js';
import { HEADER_SIZE } from './header.js';

export const MIN_FILE_SIZE = 12;
export const CANVAS_ENTRY = 'canvas.fig';

export interface ChunkTable {
  version: number;
  chunks: Uint8Array[];
}

export function extractChunks(bytes: Uint8Array): ChunkTable {
  if (bytes.length < MIN_FILE_SIZE) {
    const err: ContainerError = { code: 'FILE_TOO_SMALL', expected: MIN_FILE_SIZE, actual: bytes.length };
    throw err;
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const version = view.getUint32(HEADER_SIZE, true);

  const chunks: Uint8Array[] = [];
  let offset = MIN_FILE_SIZE;
  // 길이 필드도 못 읽는 꼬리 바이트는 무시
  while (offset + 4 <= bytes.length) {
    const length = view.getUint32(offset, true);
    const start = offset + 4;
    if (start + length > bytes.length) {
      const err: ContainerError = {
        code: 'INCOMPLETE_CHUNK',
        offset,
        expected: length,
        actual: bytes.length - start,
      };
      throw err;
    }
    chunks.push(bytes.subarray(start, start + length));
    offset = start + length;
  }

  if (chunks.length < 2) {
    const err: ContainerError = { code: 'NOT_ENOUGH_CHUNKS', expected: 2, actual: chunks.length };
    throw err;
  }
  return { version, chunks };
}

/** ZIP 안의 모든 항목 (이름 → 내용) */
export function readZipEntries(bytes: Uint8Array): Map<string, Uint8Array> {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return new Map(Object.entries(UZIP.parse(buffer)));
}

export function extractFromZip(bytes: Uint8Array): Uint8Array {
  return findCanvas(readZipEntries(bytes));
}

export function findCanvas(entries: ReadonlyMap<string, Uint8Array>): Uint8Array {
  const canvas = entries.get(CANVAS_ENTRY);
  if (canvas === undefined) {
    const err: ContainerError = { code: 'CANVAS_NOT_FOUND', entries: [...entries.keys()] };
    throw err;
  }
  return canvas;
}
