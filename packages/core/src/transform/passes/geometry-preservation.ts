/**
 * 5. 지오메트리 / 콘텐츠 보존
 *
 * 보존 목록의 노드 필드(벡터 경로, blob 에서 온 경로, 이미지 참조)가
 * 앞선 패스에서 사라졌으면 파이프라인 실행 전 노드에서 되살린다.
 */

import { FIELD_GROUPS, mapTree, replaceGroup, type DesignNode } from '../../tree/node.js';
import type { PassContext, TransformPass } from '../types.js';

export class GeometryPreservationPass implements TransformPass {
  readonly name = 'geometry-preservation';

  run(root: DesignNode, ctx: PassContext): DesignNode {
    return mapTree(root, node => {
      const source = ctx.source(node.key);
      if (source === undefined) return node;

      let result = node;
      for (const group of FIELD_GROUPS) {
        for (const field of ctx.config.preserve) {
          const original = source[group][field];
          if (original === undefined || result[group][field] !== undefined) continue;
          result = replaceGroup(result, group, { ...result[group], [field]: original });
        }
      }
      return result;
    });
  }
}
