/**
 * 변환 파이프라인
 *
 * 고정 순서:
 *   1. DefaultStrippingPass
 *   2. MetadataRemovalPass
 *   3. RedundantFieldRemovalPass
 *   4. ValueRewritePass
 *   5. InternalNodeFilterPass      (기본값 / 메타데이터 제거 뒤에 빈 노드 판정)
 *   6. GeometryPreservationPass
 *
 * 1~4 는 트리가 더 바뀌지 않을 때까지 반복한다.
 * 파생 필드를 지우고 남은 값이 다시 기본값이 되는 경우가 있다.
 *
 * 설정은 생성자로 명시적으로 받는다. 프로세스 전역 상태 없음.
 * 전체 파이프라인은 멱등: 자기 출력에 다시 돌려도 바뀌지 않는다.
 */

import { logger } from '../utils/logger.js';
import { outputEquals } from '../output/types.js';
import { FIELD_GROUPS, indexByKey, type DesignNode } from '../tree/node.js';
import { DEFAULT_PIPELINE_CONFIG } from './defaults.js';
import { DefaultStrippingPass } from './passes/default-stripping.js';
import { GeometryPreservationPass } from './passes/geometry-preservation.js';
import { InternalNodeFilterPass } from './passes/internal-node-filter.js';
import { MetadataRemovalPass } from './passes/metadata-removal.js';
import { RedundantFieldRemovalPass } from './passes/redundant-field-removal.js';
import { ValueRewritePass } from './passes/value-rewrite.js';
import type { PassContext, PipelineConfig, TransformPass } from './types.js';

/** 파이프라인 없이 패스 하나만 돌릴 때도 쓴다 */
export function createPassContext(config: PipelineConfig, source: DesignNode): PassContext {
  const index = indexByKey(source);
  const preserved = new Set(config.preserve);
  return {
    config,
    source: key => index.get(key),
    isPreserved: field => preserved.has(field),
  };
}

/** 필드와 id 가 같은 모양의 트리인지. 1~4 패스는 노드를 지우지 않는다 */
function sameTree(a: DesignNode, b: DesignNode): boolean {
  if (a.id !== b.id || a.children.length !== b.children.length) return false;
  if (!FIELD_GROUPS.every(group => outputEquals(a[group], b[group]))) return false;
  return a.children.every((child, i) => {
    const other = b.children[i];
    return other !== undefined && sameTree(child, other);
  });
}

export class TransformPipeline {
  /** 고정점까지 반복하는 정리 패스 */
  private readonly cleanup: readonly TransformPass[] = [
    new DefaultStrippingPass(),
    new MetadataRemovalPass(),
    new RedundantFieldRemovalPass(),
    new ValueRewritePass(),
  ];

  private readonly finish: readonly TransformPass[] = [
    new InternalNodeFilterPass(),
    new GeometryPreservationPass(),
  ];

  constructor(private readonly config: PipelineConfig = DEFAULT_PIPELINE_CONFIG) {}

  get passNames(): string[] {
    return [...this.cleanup, ...this.finish].map(pass => pass.name);
  }

  run(root: DesignNode): DesignNode {
    const ctx = createPassContext(this.config, root);
    let current = root;
    let round = 0;
    for (;;) {
      round++;
      const before = current;
      current = this.runPasses(this.cleanup, current, ctx);
      if (sameTree(before, current)) break;
    }
    logger.debug(`정리 패스 ${round}회 반복`);
    return this.runPasses(this.finish, current, ctx);
  }

  private runPasses(passes: readonly TransformPass[], root: DesignNode, ctx: PassContext): DesignNode {
    let current = root;
    for (const pass of passes) {
      const started = performance.now();
      current = pass.run(current, ctx);
      logger.debug(`${pass.name}: ${(performance.now() - started).toFixed(2)}ms`);
    }
    return current;
  }
}
