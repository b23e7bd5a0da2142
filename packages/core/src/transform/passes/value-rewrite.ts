/**
 * 4. 값 재작성
 *
 * 이름으로 고른 규칙을 REWRITE_RULES 순서로 적용한다.
 *   invisiblePaints   — visible: false 인 페인트를 페인트 배열에서 뺀다
 *   emptyPaintArrays  — 빈 페인트 배열 필드를 지운다
 *   colorToCss        — { r, g, b, a? } (0~1) → "#rrggbb" / "#rrggbbaa"
 *   matrixToCss       — transform { m00 … m12 } → { x, y, rotation, scaleX, scaleY, skewX }
 *   emptyObjects      — 값이 {} 인 필드와 배열 원소를 지운다
 *
 * 규칙은 자식 값부터 적용한다. 보존 목록의 키는 건드리지도, 안으로 내려가지도 않는다.
 */

import { isOutputObject, type OutputObject, type OutputValue } from '../../output/types.js';
import { mapTree, withGroups, type DesignNode } from '../../tree/node.js';
import { REWRITE_RULES } from '../defaults.js';
import type { PassContext, RewriteRuleName, TransformPass } from '../types.js';

/** 객체 하나를 받아 새 객체를 돌려준다. 값은 이미 재작성된 상태 */
export type RewriteRule = (object: OutputObject, ctx: PassContext) => OutputObject;

const PAINT_FIELDS = new Set(['fillPaints', 'strokePaints', 'backgroundPaints']);

const ALPHA_EPSILON = 0.001;

/** undefined 를 돌려주면 그 키를 지운다 */
function mapEntries(
  object: OutputObject,
  ctx: PassContext,
  fn: (key: string, value: OutputValue) => OutputValue | undefined,
): OutputObject {
  const result: OutputObject = {};
  for (const [key, value] of Object.entries(object)) {
    if (ctx.isPreserved(key)) {
      result[key] = value;
      continue;
    }
    const next = fn(key, value);
    if (next !== undefined) result[key] = next;
  }
  return result;
}

// ─── 색상 ────────────────────────────────────────────────────────────────────

function channel(value: number): string {
  const byte = Math.round(Math.min(Math.max(value, 0), 1) * 255);
  return byte.toString(16).padStart(2, '0');
}

export function colorToHex(value: OutputValue): string | undefined {
  if (!isOutputObject(value)) return undefined;
  const { r, g, b, a } = value;
  if (typeof r !== 'number' || typeof g !== 'number' || typeof b !== 'number') return undefined;
  if (a !== undefined && typeof a !== 'number') return undefined;

  const hex = `#${channel(r)}${channel(g)}${channel(b)}`;
  return a === undefined || Math.abs(a - 1) < ALPHA_EPSILON ? hex : `${hex}${channel(a)}`;
}

function replaceColors(value: OutputValue): OutputValue {
  if (Array.isArray(value)) return value.map(replaceColors);
  return colorToHex(value) ?? value;
}

// ─── 행렬 ────────────────────────────────────────────────────────────────────

const MATRIX_KEYS = ['m00', 'm01', 'm02', 'm10', 'm11', 'm12'] as const;

/**
 * [m00 m01 m02]
 * [m10 m11 m12] 아핀 행렬을 이동 / 회전 / 배율 / 기울임(도 단위)으로 분해
 */
export function decomposeMatrix(value: OutputValue): OutputObject | undefined {
  if (!isOutputObject(value)) return undefined;
  const m: number[] = [];
  for (const key of MATRIX_KEYS) {
    const entry = value[key];
    if (typeof entry !== 'number') return undefined;
    m.push(entry);
  }
  const [m00 = 0, m01 = 0, m02 = 0, m10 = 0, m11 = 0, m12 = 0] = m;

  const toDegrees = 180 / Math.PI;
  const scaleX = Math.sqrt(m00 * m00 + m10 * m10);
  const degenerate = scaleX < 1e-10;
  const determinant = m00 * m11 - m01 * m10;

  return {
    x: m02,
    y: m12,
    rotation: Math.atan2(m10, m00) * toDegrees,
    scaleX,
    scaleY: degenerate ? Math.sqrt(m01 * m01 + m11 * m11) : determinant / scaleX,
    skewX: degenerate ? 0 : Math.atan((m00 * m01 + m10 * m11) / (scaleX * scaleX)) * toDegrees,
  };
}

// ─── 빈 값 ───────────────────────────────────────────────────────────────────

function isEmptyObject(value: OutputValue): boolean {
  return isOutputObject(value) && Object.keys(value).length === 0;
}

function dropEmptyObjects(value: OutputValue): OutputValue {
  if (!Array.isArray(value)) return value;
  return value.filter(item => !isEmptyObject(item)).map(dropEmptyObjects);
}

// ─── 규칙 표 ─────────────────────────────────────────────────────────────────

export const REWRITE_RULE_TABLE: Readonly<Record<RewriteRuleName, RewriteRule>> = {
  invisiblePaints: (object, ctx) =>
    mapEntries(object, ctx, (key, value) =>
      PAINT_FIELDS.has(key) && Array.isArray(value)
        ? value.filter(paint => !(isOutputObject(paint) && paint['visible'] === false))
        : value,
    ),

  emptyPaintArrays: (object, ctx) =>
    mapEntries(object, ctx, (key, value) =>
      PAINT_FIELDS.has(key) && Array.isArray(value) && value.length === 0 ? undefined : value,
    ),

  colorToCss: (object, ctx) => mapEntries(object, ctx, (_key, value) => replaceColors(value)),

  matrixToCss: (object, ctx) =>
    mapEntries(object, ctx, (key, value) => (key === 'transform' ? decomposeMatrix(value) ?? value : value)),

  emptyObjects: (object, ctx) =>
    mapEntries(object, ctx, (_key, value) => (isEmptyObject(value) ? undefined : dropEmptyObjects(value))),
};

function rewriteValue(value: OutputValue, rule: RewriteRule, ctx: PassContext): OutputValue {
  if (Array.isArray(value)) return value.map(item => rewriteValue(item, rule, ctx));
  return isOutputObject(value) ? rewriteObject(value, rule, ctx) : value;
}

function rewriteObject(object: OutputObject, rule: RewriteRule, ctx: PassContext): OutputObject {
  const inner: OutputObject = {};
  for (const [key, value] of Object.entries(object)) {
    inner[key] = ctx.isPreserved(key) ? value : rewriteValue(value, rule, ctx);
  }
  return rule(inner, ctx);
}

export class ValueRewritePass implements TransformPass {
  readonly name = 'value-rewrite';

  run(root: DesignNode, ctx: PassContext): DesignNode {
    const rules = REWRITE_RULES.filter(name => ctx.config.rewrites.includes(name)).map(
      name => REWRITE_RULE_TABLE[name],
    );
    if (rules.length === 0) return root;

    return mapTree(root, node =>
      withGroups(node, group => rules.reduce((fields, rule) => rewriteObject(fields, rule, ctx), group)),
    );
  }
}
