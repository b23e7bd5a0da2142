/**
 * cli/src/commands/convert.ts
 * figjson convert — .fig 파일 → JSON 변환 메인 커맨드
 *
 * 실행 흐름:
 * 1. figjson.config.yml 로드 (없으면 기본값)
 * 2. CLI 플래그로 설정 override
 * 3. 파일마다 컨테이너 해제 → 디코드 → 트리 빌드 → 파이프라인
 * 4. <name>.json / <name>.raw.json / images/ 쓰기
 * 5. 요약 출력
 */

import fs from 'node:fs';
import path from 'node:path';
import { log, printSummary } from '../logger.js';
import { baseNameOf, writeResult } from '../output.js';
import {
  convertFigFile,
  createConfig,
  createProgress,
  describeError,
  loadConfig,
  toConvertOptions,
  type FigJsonConfig,
} from '@fig-json/core';

export interface ConvertOptions {
  /** 변환할 .fig 파일들 */
  files: string[];
  /** 설정 파일 경로 (기본: 자동 탐색) */
  config?: string;
  /** 출력 디렉토리 override */
  outDir?: string;
  /** raw 출력도 함께 */
  raw?: boolean;
  /** raw 출력만 */
  rawOnly?: boolean;
  pretty?: boolean;
  /** 루트 정의 이름 */
  rootType?: string;
  keepExtras?: boolean;
  /** 작업 디렉토리 */
  cwd?: string;
}

export async function runConvert(options: ConvertOptions): Promise<void> {
  const cwd = options.cwd ?? process.cwd();

  if (options.files.length === 0) {
    log.error('변환할 .fig 파일을 지정하세요');
    log.step('figjson convert design.fig [--out=<dir>]');
    process.exit(1);
  }

  // ── 설정 로드 ──────────────────────────────────────────────────────────────

  let config: FigJsonConfig;
  try {
    config = createConfig(
      {
        ...(options.outDir !== undefined && { outDir: options.outDir }),
        ...(options.pretty !== undefined && { pretty: options.pretty }),
        ...(options.raw !== undefined && { raw: options.raw }),
        ...(options.rawOnly !== undefined && { rawOnly: options.rawOnly }),
        ...(options.rootType !== undefined && { rootType: options.rootType }),
        ...(options.keepExtras !== undefined && { keepExtras: options.keepExtras }),
      },
      loadConfig(options.config, cwd),
    );
  } catch (err) {
    log.error(`설정 파일 로드 실패: ${describeError(err)}`);
    log.step('figjson init 으로 설정 파일을 생성하세요');
    process.exit(1);
  }

  const outDir = path.resolve(cwd, config.output.dir);
  const convertOptions = toConvertOptions(config);

  log.title('fig-json 변환 시작');
  log.info(`입력: ${options.files.length}개 파일`);
  log.info(`출력 디렉토리: ${outDir}`);
  log.info(`출력: ${[config.output.transformed && 'transformed', config.output.raw && 'raw'].filter(Boolean).join(' + ')}`);

  // ── 변환 실행 ─────────────────────────────────────────────────────────────

  let done = 0;
  let warnings = 0;
  const errors: string[] = [];
  const progress = createProgress(options.files.length);
  const messages: Array<() => void> = [];

  for (const file of options.files) {
    const input = path.resolve(cwd, file);
    progress.tick(path.basename(input));
    try {
      const bytes = fs.readFileSync(input);
      const result = convertFigFile(bytes, convertOptions);
      const written = writeResult(result, outDir, baseNameOf(input), {
        pretty: config.output.pretty,
        images: config.output.images,
      });

      const { stats } = result;
      messages.push(() => {
        log.success(
          `${file}: ${result.fileType} v${result.version}, 정의 ${stats.definitions}개, ` +
            `노드 ${stats.nodes} → ${stats.outputNodes} (${written.length}개 파일)`,
        );
      });
      if (stats.unknownFields > 0) {
        warnings++;
        messages.push(() => {
          log.warn(`${file}: 스키마에 없는 필드 ${stats.unknownFields}개를 건너뜀`);
        });
      }
      if (stats.orphans > 0) {
        warnings++;
        messages.push(() => {
          log.warn(`${file}: 부모를 찾지 못한 노드 ${stats.orphans}개`);
        });
      }
      done++;
    } catch (err) {
      const msg = describeError(err);
      messages.push(() => {
        log.error(`${file}: ${msg}`);
      });
      errors.push(`${file}: ${msg}`);
    }
  }
  progress.done();
  for (const print of messages) print();

  // ── 에러 로그 저장 ────────────────────────────────────────────────────────

  let errorLogPath: string | undefined;
  if (errors.length > 0) {
    errorLogPath = path.join(cwd, 'figjson-errors.log');
    const timestamp = new Date().toISOString();
    const content = errors.map(e => `[${timestamp}] ${e}`).join('\n') + '\n';
    fs.appendFileSync(errorLogPath, content, 'utf-8');
  }

  // ── 요약 출력 ─────────────────────────────────────────────────────────────

  printSummary({
    done,
    total: options.files.length,
    warnings,
    errors: errors.length,
    ...(errorLogPath !== undefined && { logFile: errorLogPath }),
  });

  if (errors.length > 0) process.exit(1);
}
