/**
 * 변환 파이프라인 계약
 * 모든 패스(DefaultStripping, MetadataRemoval, …)가 구현해야 하는 인터페이스
 */

import type { OutputValue } from '../output/types.js';
import type { DesignNode } from '../tree/node.js';

/**
 * 기본값 테이블 항목
 * - nodeTypes 가 있으면 그 종류 노드의 최상위 필드에만 적용
 * - 없으면 노드 필드와 그 안의 중첩 객체 어디서든 적용
 */
export interface DefaultEntry {
  field: string;
  value: OutputValue;
  nodeTypes?: readonly string[];
}

export type RedundantRuleName = 'cornerRadii' | 'padding' | 'textLayoutSize' | 'boundingBox';

export type RewriteRuleName = 'invisiblePaints' | 'emptyPaintArrays' | 'colorToCss' | 'matrixToCss' | 'emptyObjects';

export interface PipelineConfig {
  defaults: readonly DefaultEntry[];
  /** 어느 깊이에서든 지울 필드 이름 */
  metadataFields: readonly string[];
  redundantRules: readonly RedundantRuleName[];
  /** 값 재작성 규칙. 순서와 무관하게 고정 순서로 적용 */
  rewrites: readonly RewriteRuleName[];
  /** 어떤 패스도 지우지 않는 노드 필드 (벡터 경로, 이미지 참조 등) */
  preserve: readonly string[];
}

export interface PassContext {
  readonly config: PipelineConfig;
  /** 파이프라인 실행 전 같은 key 의 노드 */
  source(key: number): DesignNode | undefined;
  isPreserved(field: string): boolean;
}

export interface TransformPass {
  readonly name: string;

  /** 입력 노드를 수정하지 않고 새 트리를 돌려준다 */
  run(root: DesignNode, ctx: PassContext): DesignNode;
}
