/**
 * 매직 헤더 판별
 *   "fig-kiwi" → figma, "fig-jam." → figjam, "PK" → ZIP 래퍼
 */

import type { ContainerError } from '../utils/errors.js';

export type FileType = 'figma' | 'figjam';

export const HEADER_SIZE = 8;

const MAGIC: ReadonlyMap<string, FileType> = new Map<string, FileType>([
  ['fig-kiwi', 'figma'],
  ['fig-jam.', 'figjam'],
]);

export function detectFileType(bytes: Uint8Array): FileType {
  if (bytes.length < HEADER_SIZE) {
    const err: ContainerError = { code: 'FILE_TOO_SMALL', expected: HEADER_SIZE, actual: bytes.length };
    throw err;
  }
  const header = String.fromCharCode(...bytes.subarray(0, HEADER_SIZE));
  const fileType = MAGIC.get(header);
  if (fileType === undefined) {
    const err: ContainerError = { code: 'INVALID_HEADER', header };
    throw err;
  }
  return fileType;
}

export function isZipContainer(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === 0x50 && bytes[1] === 0x4b;
}
