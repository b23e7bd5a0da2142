/**
 * cli/src/commands/inspect.ts
 * figjson inspect — 컨테이너 헤더 / 청크 / 스키마 정의 출력
 *
 * 데이터 청크는 디코드하지 않는다.
 */

import fs from 'node:fs';
import path from 'node:path';
import { log } from '../logger.js';
import {
  decodeSchema,
  decompressChunk,
  describeError,
  detectFileType,
  extractChunks,
  findCanvas,
  isZipContainer,
  readZipEntries,
  type Schema,
} from '@fig-json/core';

export interface InspectOptions {
  file?: string;
  /** 정의별 필드까지 출력 */
  fields?: boolean;
  cwd?: string;
}

/** 출력할 줄 목록 (색 없음) */
export function inspectFig(bytes: Uint8Array, withFields = false): string[] {
  const lines: string[] = [];
  let canvas = bytes;
  if (isZipContainer(bytes)) {
    const entries = readZipEntries(bytes);
    lines.push(`컨테이너: ZIP (${entries.size}개 항목)`);
    canvas = findCanvas(entries);
  }

  const fileType = detectFileType(canvas);
  const { version, chunks } = extractChunks(canvas);
  lines.push(`파일 종류: ${fileType}`);
  lines.push(`버전: ${version}`);
  chunks.forEach((chunk, i) => {
    lines.push(`청크 ${i}: ${chunk.length}B`);
  });

  const [schemaChunk] = chunks;
  if (schemaChunk === undefined) return lines;
  const schema = decodeSchema(decompressChunk(schemaChunk));
  lines.push(`정의: ${schema.size}개`);
  for (const def of schema.definitions) {
    lines.push(`  ${def.kind} ${def.name} (${def.fields.length})`);
    if (withFields) lines.push(...describeFields(schema, def.id));
  }
  return lines;
}

export async function runInspect(options: InspectOptions): Promise<void> {
  const cwd = options.cwd ?? process.cwd();
  if (options.file === undefined) {
    log.error('검사할 .fig 파일을 지정하세요');
    process.exit(1);
  }

  const input = path.resolve(cwd, options.file);
  try {
    const lines = inspectFig(fs.readFileSync(input), options.fields ?? false);
    log.title(path.basename(input));
    log.report(lines);
  } catch (err) {
    log.error(`${options.file}: ${describeError(err)}`);
    process.exit(1);
  }
}

// ─── 내부 유틸 ───────────────────────────────────────────────────────────────

function describeFields(schema: Schema, id: number): string[] {
  const def = schema.typeDef(id);
  if (def === undefined) return [];
  if (def.kind === 'enum') return def.fields.map(member => `    ${member.name} = ${member.tag}`);
  return def.fields.map(field => `    ${field.tag}: ${field.name} ${schema.describeType(field.type, field.modifier)}`);
}
