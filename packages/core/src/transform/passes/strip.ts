/**
 * 패스 공용 필드 제거 도우미
 *
 * 보존 목록(preserve)에 있는 키는 어느 깊이에서든 지우지도, 안으로 내려가지도 않는다.
 */

import { isOutputObject, type OutputObject, type OutputValue } from '../../output/types.js';
import type { DesignNode, FieldGroup } from '../../tree/node.js';
import { FIELD_GROUPS } from '../../tree/node.js';
import type { PassContext } from '../types.js';

/** depth 0 = 노드 최상위 필드 */
export type RemovePredicate = (key: string, value: OutputValue, depth: number) => boolean;

/**
 * 자식부터 먼저 정리한 뒤 키를 검사한다.
 * 그래서 한 번 더 돌려도 더 지울 것이 없다.
 */
export function removeDeep(
  value: OutputValue,
  shouldRemove: RemovePredicate,
  ctx: PassContext,
  depth = 0,
): OutputValue {
  if (Array.isArray(value)) return value.map(item => removeDeep(item, shouldRemove, ctx, depth));
  if (!isOutputObject(value)) return value;
  return removeFromObject(value, shouldRemove, ctx, depth);
}

export function removeFromObject(
  object: OutputObject,
  shouldRemove: RemovePredicate,
  ctx: PassContext,
  depth = 0,
): OutputObject {
  const result: OutputObject = {};
  for (const [key, value] of Object.entries(object)) {
    if (ctx.isPreserved(key)) {
      result[key] = value;
      continue;
    }
    const cleaned = removeDeep(value, shouldRemove, ctx, depth + 1);
    if (!shouldRemove(key, cleaned, depth)) result[key] = cleaned;
  }
  return result;
}

/** 노드 최상위 필드 하나가 들어 있는 그룹 */
export function findField(node: DesignNode, key: string): { group: FieldGroup; value: OutputValue } | undefined {
  for (const group of FIELD_GROUPS) {
    const value = node[group][key];
    if (value !== undefined) return { group, value };
  }
  return undefined;
}

/** 객체 안의 경로 하나를 지운 사본. 경로가 없으면 원본 그대로 */
export function removePath(object: OutputObject, path: readonly string[]): OutputObject {
  const [head, ...rest] = path;
  if (head === undefined || !(head in object)) return object;

  const result: OutputObject = { ...object };
  if (rest.length === 0) {
    delete result[head];
    return result;
  }
  const inner = object[head];
  if (!isOutputObject(inner)) return object;
  result[head] = removePath(inner, rest);
  return result;
}
