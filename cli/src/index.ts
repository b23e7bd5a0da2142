#!/usr/bin/env node
/**
 * fig-json CLI 진입점
 *
 * 사용법:
 *   figjson init                      — 설정 파일 생성
 *   figjson convert <files...>        — .fig → JSON 변환
 *   figjson inspect <file>            — 헤더 / 청크 / 스키마 정의 출력
 *   figjson help                      — 도움말
 *
 * 옵션:
 *   --config=<path>               설정 파일 경로 (기본: ./figjson.config.yml 자동 탐색)
 *   --out=<dir>                   출력 디렉토리 override
 *   --raw                         raw 출력도 함께 생성
 *   --raw-only                    raw 출력만 생성
 *   --pretty / --compact          JSON 들여쓰기 여부
 *   --root=<type>                 루트 정의 이름
 *   --keep-extras                 부기 필드를 extras 에 남김
 *   --fields                      정의별 필드 출력 (inspect)
 *   --force                       강제 덮어쓰기 (init)
 */

import { parseArgs, hasFlag } from './args.js';
import { log } from './logger.js';

const VERSION = '0.1.0';

const HELP = `
fig-json v${VERSION} — Figma .fig → JSON 변환 CLI

사용법:
  figjson <command> [options]

커맨드:
  init      figjson.config.yml 생성
  convert   .fig 파일 → JSON 변환
  inspect   컨테이너 헤더, 청크, 스키마 정의 출력
  help      도움말 출력

옵션 (convert):
  --config=<path>     설정 파일 경로 (기본: ./figjson.config.yml)
  --out=<dir>         출력 디렉토리 override
  --raw               <name>.raw.json 도 함께 생성
  --raw-only          <name>.raw.json 만 생성
  --pretty            들여쓴 JSON
  --compact           한 줄 JSON
  --root=<type>       루트 정의 이름 (기본: Message)
  --keep-extras       editInfo 같은 부기 필드를 extras 에 남김

옵션 (inspect):
  --fields            정의별 필드 목록까지 출력

예시:
  figjson init
  figjson convert design.fig --out=./json
  figjson convert a.fig b.fig --raw --compact
  figjson inspect design.fig --fields
`.trim();

async function main(): Promise<void> {
  // 값 없는 플래그 뒤의 파일 이름을 값으로 먹지 않도록 --key=value 만 옵션으로 본다
  const args = parseArgs(process.argv.slice(2), { inlineValuesOnly: true });

  switch (args.command) {
    case 'version':
    case '--version':
    case '-v': {
      console.log(`fig-json v${VERSION}`);
      break;
    }

    case 'help':
    case '--help':
    case '-h': {
      console.log(HELP);
      break;
    }

    case 'init': {
      const { runInit } = await import('./commands/init.js');
      await runInit({
        force: hasFlag(args, 'force'),
        cwd: process.cwd(),
      });
      break;
    }

    case 'convert': {
      const { runConvert } = await import('./commands/convert.js');
      const outOpt = args.options.get('out');
      const configOpt = args.options.get('config');
      const rootOpt = args.options.get('root');
      await runConvert({
        files: args.positional,
        ...(configOpt && { config: configOpt }),
        ...(outOpt && { outDir: outOpt }),
        ...(rootOpt && { rootType: rootOpt }),
        ...(hasFlag(args, 'pretty') && { pretty: true }),
        ...(hasFlag(args, 'compact') && { pretty: false }),
        ...(hasFlag(args, 'raw') && { raw: true }),
        ...(hasFlag(args, 'raw-only') && { rawOnly: true }),
        ...(hasFlag(args, 'keep-extras') && { keepExtras: true }),
        cwd: process.cwd(),
      });
      break;
    }

    case 'inspect': {
      const { runInspect } = await import('./commands/inspect.js');
      const [file] = args.positional;
      await runInspect({
        ...(file !== undefined && { file }),
        fields: hasFlag(args, 'fields'),
        cwd: process.cwd(),
      });
      break;
    }

    default: {
      log.error(`알 수 없는 커맨드: ${args.command}`);
      console.log('');
      console.log(HELP);
      process.exit(1);
    }
  }
}

main().catch(err => {
  const msg = err instanceof Error ? err.message : String(err);
  log.error(`예상치 못한 오류: ${msg}`);
  if (process.env['FIGJSON_DEBUG']) {
    console.error(err);
  }
  process.exit(1);
});
