/**
 * 노드 필드의 내용 해석
 *
 * - `<name>Blob` 필드(정수 인덱스) → `<name>` 필드(파싱된 blob)
 *   인덱스가 범위 밖이거나 형식을 모르면 원래 필드 그대로
 * - 이미지 참조의 `hash` → `filename: "images/<hex>"`
 */

import { Buffer } from 'node:buffer';
import { isOutputObject, type OutputObject, type OutputValue } from '../output/types.js';
import { parseBlob } from './blob-parser.js';

const BLOB_SUFFIX = 'Blob';

const IMAGE_FIELDS: ReadonlySet<string> = new Set(['image', 'imageThumbnail', 'animatedImage', 'video']);

export const IMAGE_DIR = 'images';

export interface ContentOptions {
  blobs: readonly Uint8Array[];
  resolveBlobs: boolean;
}

export function resolveContent(value: OutputValue, options: ContentOptions): OutputValue {
  if (Array.isArray(value)) return value.map(item => resolveContent(item, options));
  if (!isOutputObject(value)) return value;
  return resolveObject(value, options);
}

export function resolveObject(object: OutputObject, options: ContentOptions): OutputObject {
  const result: OutputObject = {};
  for (const [key, value] of Object.entries(object)) {
    const blob = options.resolveBlobs ? substituteBlob(key, value, options.blobs) : null;
    if (blob !== null) {
      result[blob.key] = blob.value;
      continue;
    }
    if (IMAGE_FIELDS.has(key) && isOutputObject(value)) {
      result[key] = rewriteImageHash(resolveObject(value, options));
      continue;
    }
    result[key] = resolveContent(value, options);
  }
  return result;
}

function substituteBlob(
  key: string,
  value: OutputValue,
  blobs: readonly Uint8Array[],
): { key: string; value: OutputValue } | null {
  if (!key.endsWith(BLOB_SUFFIX) || key.length === BLOB_SUFFIX.length) return null;
  if (typeof value !== 'number' || !Number.isInteger(value)) return null;
  const bytes = blobs[value];
  if (bytes === undefined) return null;
  const kind = key.slice(0, -BLOB_SUFFIX.length);
  const parsed = parseBlob(kind, bytes);
  return parsed === null ? null : { key: kind, value: parsed };
}

/** 바이트 배열 또는 base64 문자열 → 16진수 */
export function hashToHex(hash: OutputValue): string | null {
  if (typeof hash === 'string') {
    const hex = Buffer.from(hash, 'base64').toString('hex');
    return hex.length > 0 ? hex : null;
  }
  if (!Array.isArray(hash) || hash.length === 0) return null;
  let hex = '';
  for (const byte of hash) {
    if (typeof byte !== 'number' || !Number.isInteger(byte) || byte < 0 || byte > 255) return null;
    hex += byte.toString(16).padStart(2, '0');
  }
  return hex;
}

export function rewriteImageHash(image: OutputObject): OutputObject {
  const hash = image['hash'];
  if (hash === undefined) return image;
  const hex = hashToHex(hash);
  if (hex === null) return image;

  const result: OutputObject = {};
  for (const [key, value] of Object.entries(image)) {
    if (key === 'hash') result['filename'] = `${IMAGE_DIR}/${hex}`;
    else result[key] = value;
  }
  return result;
}
