/**
 * cli/src/output.ts
 * 변환 결과 → 출력 디렉토리
 *
 *   <out>/<name>.json        변환 출력
 *   <out>/<name>.raw.json    raw 출력
 *   <out>/images/<hash>      ZIP 컨테이너의 이미지
 */

import fs from 'node:fs';
import path from 'node:path';
import { IMAGE_DIR, type FigFileResult, type FigJsonError, type OutputValue } from '@fig-json/core';

export interface WriteOptions {
  pretty: boolean;
  images: boolean;
}

/** design.fig → design */
export function baseNameOf(file: string): string {
  const base = path.basename(file);
  const ext = path.extname(base);
  return ext === '' ? base : base.slice(0, -ext.length);
}

export function serializeJson(value: OutputValue, pretty: boolean): string {
  return `${JSON.stringify(value, null, pretty ? 2 : undefined)}\n`;
}

/** 쓴 파일 경로 목록 */
export function writeResult(
  result: FigFileResult,
  outDir: string,
  name: string,
  options: WriteOptions,
): string[] {
  const written: string[] = [];
  ensureDir(outDir);

  if (result.output !== undefined) {
    const target = path.join(outDir, `${name}.json`);
    writeFile(target, serializeJson(result.output, options.pretty));
    written.push(target);
  }
  if (result.raw !== undefined) {
    const target = path.join(outDir, `${name}.raw.json`);
    writeFile(target, serializeJson(result.raw, options.pretty));
    written.push(target);
  }

  if (options.images && result.images.size > 0) {
    const imageDir = path.join(outDir, IMAGE_DIR);
    ensureDir(imageDir);
    for (const [file, content] of result.images) {
      // 하위 경로나 상위 경로를 가리키는 항목 이름은 쓰지 않는다
      if (path.basename(file) !== file || file === '..' || file === '.') continue;
      const target = path.join(imageDir, file);
      writeFile(target, content);
      written.push(target);
    }
  }
  return written;
}

// ─── 내부 유틸 ───────────────────────────────────────────────────────────────

function ensureDir(dir: string): void {
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (e) {
    const err: FigJsonError = {
      code: 'FILE_WRITE_FAILED',
      path: dir,
      reason: e instanceof Error ? e.message : String(e),
    };
    throw err;
  }
}

function writeFile(target: string, content: string | Uint8Array): void {
  try {
    fs.writeFileSync(target, content);
  } catch (e) {
    const err: FigJsonError = {
      code: 'FILE_WRITE_FAILED',
      path: target,
      reason: e instanceof Error ? e.message : String(e),
    };
    throw err;
  }
}
