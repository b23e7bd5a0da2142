/**
 * 청크 압축 해제
 *
 *   PNG / JPEG   → 이미 압축된 이미지, 그대로
 *   zstd 매직    → fzstd
 *   그 외        → raw deflate (uzip), 실패하면 zstd 재시도
 */

import { decompress as zstdDecompress } from 'fzstd';
import UZIP from 'uzip';
import { describeError, type ContainerError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const ZSTD_MAGIC = [0x28, 0xb5, 0x2f, 0xfd] as const;
const PNG_MAGIC = [0x89, 0x50] as const;
const JPEG_MAGIC = [0xff, 0xd8] as const;

function startsWith(bytes: Uint8Array, magic: readonly number[]): boolean {
  return bytes.length >= magic.length && magic.every((byte, i) => bytes[i] === byte);
}

export function isAlreadyCompressed(bytes: Uint8Array): boolean {
  return startsWith(bytes, PNG_MAGIC) || startsWith(bytes, JPEG_MAGIC);
}

export function isZstd(bytes: Uint8Array): boolean {
  return startsWith(bytes, ZSTD_MAGIC);
}

export function decompressChunk(bytes: Uint8Array): Uint8Array {
  if (isAlreadyCompressed(bytes)) return bytes;
  if (isZstd(bytes)) return decodeZstd(bytes);

  try {
    return UZIP.inflateRaw(bytes);
  } catch (deflateError) {
    logger.debug(`deflate 해제 실패, zstd 재시도: ${describeError(deflateError)}`);
    return decodeZstd(bytes);
  }
}

function decodeZstd(bytes: Uint8Array): Uint8Array {
  try {
    return zstdDecompress(bytes);
  } catch (e) {
    const err: ContainerError = { code: 'DECOMPRESSION_FAILED', reason: describeError(e) };
    throw err;
  }
}
