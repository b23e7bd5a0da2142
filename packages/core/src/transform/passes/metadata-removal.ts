/**
 * 2. 메타데이터 제거
 * 렌더링과 무관한 필드: 내부 식별자, 텍스트 레이아웃 캐시, 래스터 썸네일, 버전 카운터
 */

import { mapTree, withGroups, type DesignNode } from '../../tree/node.js';
import type { PassContext, TransformPass } from '../types.js';
import { removeFromObject } from './strip.js';

export class MetadataRemovalPass implements TransformPass {
  readonly name = 'metadata-removal';

  run(root: DesignNode, ctx: PassContext): DesignNode {
    const fields = new Set(ctx.config.metadataFields);
    return mapTree(root, node => ({
      ...withGroups(node, group => removeFromObject(group, key => fields.has(key), ctx)),
      id: null,
    }));
  }
}
