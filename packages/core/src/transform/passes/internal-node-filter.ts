/**
 * 4. 내부 노드 필터
 *
 * internalOnly 노드를 하위 트리째 지운다. 남은 형제의 순서는 그대로.
 * 앞선 패스가 필드를 모두 지워 비어 버린 opaque 노드(자식도 없음)도 함께 지운다.
 * 후위 순회라 자식이 지워져 비게 된 부모도 같은 실행에서 판정된다. 루트는 남긴다.
 */

import { fieldCount, type DesignNode } from '../../tree/node.js';
import type { PassContext, TransformPass } from '../types.js';

export class InternalNodeFilterPass implements TransformPass {
  readonly name = 'internal-node-filter';

  run(root: DesignNode, ctx: PassContext): DesignNode {
    return this.filterChildren(root, ctx);
  }

  private filterChildren(node: DesignNode, ctx: PassContext): DesignNode {
    const children: DesignNode[] = [];
    for (const child of node.children) {
      if (child.internalOnly) continue;
      const filtered = this.filterChildren(child, ctx);
      if (this.isEmptyOpaque(filtered, ctx)) continue;
      children.push(filtered);
    }
    return { ...node, children };
  }

  private isEmptyOpaque(node: DesignNode, ctx: PassContext): boolean {
    if (!node.opaque || node.children.length > 0 || fieldCount(node) > 0) return false;
    const source = ctx.source(node.key);
    return source !== undefined && fieldCount(source) > 0;
  }
}
