/**
 * 3. 파생 가능한 필드 제거
 *
 * 남아 있는 다른 필드로 완전히 다시 계산할 수 있는 값만 지운다.
 * 규칙은 이름으로 골라 쓰며, 각 규칙은 지울 경로 목록을 돌려준다.
 * 경로의 첫 요소는 노드 최상위 필드.
 */

import { isOutputObject, outputEquals, type OutputValue } from '../../output/types.js';
import { mapTree, replaceGroup, type DesignNode } from '../../tree/node.js';
import type { PassContext, RedundantRuleName, TransformPass } from '../types.js';
import { findField, removePath } from './strip.js';

export type FieldPath = readonly [string, ...string[]];

export type RedundantRule = (node: DesignNode) => FieldPath[];

const CORNER_FIELDS = [
  'rectangleTopLeftCornerRadius',
  'rectangleTopRightCornerRadius',
  'rectangleBottomLeftCornerRadius',
  'rectangleBottomRightCornerRadius',
] as const;

function value(node: DesignNode, key: string): OutputValue | undefined {
  return findField(node, key)?.value;
}

function numberAt(node: DesignNode, key: string): number | undefined {
  const found = value(node, key);
  return typeof found === 'number' ? found : undefined;
}

export const REDUNDANT_RULE_TABLE: Readonly<Record<RedundantRuleName, RedundantRule>> = {
  /** 모서리별 반경이 cornerRadius 와 같음 */
  cornerRadii(node) {
    const radius = numberAt(node, 'cornerRadius');
    if (radius === undefined) return [];
    return CORNER_FIELDS.filter(key => numberAt(node, key) === radius).map((key): FieldPath => [key]);
  },

  /** 오른쪽 / 아래 패딩이 가로 / 세로 패딩과 같음 */
  padding(node) {
    const paths: FieldPath[] = [];
    const horizontal = numberAt(node, 'stackHorizontalPadding');
    const vertical = numberAt(node, 'stackVerticalPadding');
    if (horizontal !== undefined && numberAt(node, 'stackPaddingRight') === horizontal) {
      paths.push(['stackPaddingRight']);
    }
    if (vertical !== undefined && numberAt(node, 'stackPaddingBottom') === vertical) {
      paths.push(['stackPaddingBottom']);
    }
    return paths;
  },

  /** derivedTextData.layoutSize 가 size 와 같음 */
  textLayoutSize(node) {
    const size = value(node, 'size');
    const derived = value(node, 'derivedTextData');
    if (size === undefined || !isOutputObject(derived)) return [];
    const layoutSize = derived['layoutSize'];
    return layoutSize !== undefined && outputEquals(layoutSize, size) ? [['derivedTextData', 'layoutSize']] : [];
  },

  /** transform 이 있을 때 absoluteBoundingBox 크기가 size 와 같음 */
  boundingBox(node) {
    const size = value(node, 'size');
    const box = value(node, 'absoluteBoundingBox');
    if (value(node, 'transform') === undefined) return [];
    if (!isOutputObject(size) || !isOutputObject(box)) return [];
    const sameWidth = typeof size['x'] === 'number' && size['x'] === box['width'];
    const sameHeight = typeof size['y'] === 'number' && size['y'] === box['height'];
    return sameWidth && sameHeight ? [['absoluteBoundingBox']] : [];
  },
};

export class RedundantFieldRemovalPass implements TransformPass {
  readonly name = 'redundant-field-removal';

  run(root: DesignNode, ctx: PassContext): DesignNode {
    const rules = ctx.config.redundantRules.map(name => REDUNDANT_RULE_TABLE[name]);

    return mapTree(root, node => {
      let result = node;
      for (const rule of rules) {
        for (const path of rule(result)) {
          if (path.some(segment => ctx.isPreserved(segment))) continue;
          const found = findField(result, path[0]);
          if (found === undefined) continue;
          result = replaceGroup(result, found.group, removePath(result[found.group], path));
        }
      }
      return result;
    });
  }
}
