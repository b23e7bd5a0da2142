/**
 * .fig 컨테이너 → 스키마 / 데이터 바이트
 * 디코더는 아카이브 구조를 모른다. 여기서 두 버퍼만 넘겨준다.
 */

import type { ContainerError } from '../utils/errors.js';
import { extractChunks, findCanvas, readZipEntries, CANVAS_ENTRY } from './chunks.js';
import { decompressChunk } from './compression.js';
import { detectFileType, isZipContainer, type FileType } from './header.js';

export * from './header.js';
export * from './chunks.js';
export * from './compression.js';

export interface FigFile {
  fileType: FileType;
  version: number;
  schema: Uint8Array;
  data: Uint8Array;
  /** ZIP 래퍼의 images/ 항목 (파일 이름 → 내용) */
  images: Map<string, Uint8Array>;
}

const IMAGE_PREFIX = 'images/';

export function readFigFile(bytes: Uint8Array): FigFile {
  let canvas = bytes;
  const images = new Map<string, Uint8Array>();

  if (isZipContainer(bytes)) {
    const entries = readZipEntries(bytes);
    canvas = findCanvas(entries);
    for (const [name, content] of entries) {
      if (name !== CANVAS_ENTRY && name.startsWith(IMAGE_PREFIX) && name.length > IMAGE_PREFIX.length) {
        images.set(name.slice(IMAGE_PREFIX.length), content);
      }
    }
  }

  const fileType = detectFileType(canvas);
  const { version, chunks } = extractChunks(canvas);
  const [schemaChunk, dataChunk] = chunks;
  if (schemaChunk === undefined || dataChunk === undefined) {
    const err: ContainerError = { code: 'NOT_ENOUGH_CHUNKS', expected: 2, actual: chunks.length };
    throw err;
  }

  return {
    fileType,
    version,
    schema: decompressChunk(schemaChunk),
    data: decompressChunk(dataChunk),
    images,
  };
}
