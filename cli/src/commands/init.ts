/**
 * cli/src/commands/init.ts
 * figjson init — figjson.config.yml 초기 생성
 *
 * 이미 존재하면 경고 후 종료 (--force 로 덮어쓰기 가능)
 */

import fs from 'node:fs';
import path from 'node:path';
import { log } from '../logger.js';

export const CONFIG_FILENAME = 'figjson.config.yml';

export const TEMPLATE = `# fig-json 설정 파일
# 모든 항목은 선택. 없으면 기본값을 쓴다. \${ENV_VAR} 는 환경변수로 치환된다.

output:
  dir: "./out"
  pretty: true
  raw: false            # <name>.raw.json (스키마 필드 이름 그대로, 패스 없음)
  transformed: true     # <name>.json
  images: true          # ZIP 안의 images/ 를 출력 디렉토리에 복사

decode:
  # rootType: "Message"  # 없으면 Message 또는 마지막 message 정의
  maxDepth: 512

tree:
  childFields:
    - children
  keepExtras: false     # editInfo, pluginData 같은 부기 필드를 extras 에 남김
  resolveBlobs: true    # commandsBlob / vectorNetworkBlob → 파싱된 값

# 목록은 기본 목록을 통째로 교체한다
# transform:
#   defaults:
#     - { field: opacity, value: 1 }
#     - { field: paragraphSpacing, value: 0, nodeTypes: [TEXT] }
#   metadataFields: [guid, editInfo, pluginData]
#   preserve: [fillGeometry, strokeGeometry, vectorNetwork, commands, image]
#   redundantRules: [cornerRadii, padding, textLayoutSize, boundingBox]
#   rewrites: [invisiblePaints, emptyPaintArrays, emptyObjects]  # + colorToCss, matrixToCss
`;

export async function runInit(options: { force?: boolean; cwd?: string } = {}): Promise<void> {
  const cwd = options.cwd ?? process.cwd();
  const configPath = path.join(cwd, CONFIG_FILENAME);

  if (fs.existsSync(configPath) && !options.force) {
    log.warn(`${CONFIG_FILENAME} 이미 존재합니다. --force 옵션으로 덮어쓰기 가능`);
    process.exit(1);
  }

  fs.writeFileSync(configPath, TEMPLATE, 'utf-8');
  log.success(`${CONFIG_FILENAME} 생성 완료`);

  console.log('');
  log.info('다음 단계:');
  log.step('1. 출력 디렉토리와 옵션 확인');
  log.step('2. figjson convert design.fig 실행');
}
