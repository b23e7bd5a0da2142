/**
 * 1. 기본값 제거
 *
 * 값이 기본값 테이블 항목과 엄격하게 같은 필드를 지운다 (숫자는 === 비교, 근사 없음).
 *   nodeTypes 있는 항목 — 해당 종류 노드의 최상위 필드에만
 *   nodeTypes 없는 항목 — 노드 필드와 중첩 객체 어디서든
 */

import { outputEquals, type OutputValue } from '../../output/types.js';
import { mapTree, withGroups, type DesignNode } from '../../tree/node.js';
import type { DefaultEntry, PassContext, TransformPass } from '../types.js';
import { removeFromObject } from './strip.js';

function matches(entries: readonly DefaultEntry[], key: string, value: OutputValue): boolean {
  return entries.some(entry => entry.field === key && outputEquals(entry.value, value));
}

export class DefaultStrippingPass implements TransformPass {
  readonly name = 'default-stripping';

  run(root: DesignNode, ctx: PassContext): DesignNode {
    const anyDepth = ctx.config.defaults.filter(entry => entry.nodeTypes === undefined);

    return mapTree(root, node => {
      const nodeLevel = ctx.config.defaults.filter(
        entry =>
          entry.nodeTypes === undefined ||
          (node.type !== null && entry.nodeTypes.includes(node.type)),
      );
      return withGroups(node, group =>
        removeFromObject(
          group,
          (key, value, depth) => matches(depth === 0 ? nodeLevel : anyDepth, key, value),
          ctx,
        ),
      );
    });
  }
}
