/**
 * 노드 계층 모델
 *
 * 노드 트리 빌더가 만들고 변환 파이프라인이 다시 만드는 렌더링 문서.
 * 각 노드는 자식을 독점 소유한다 (DAG 가 아닌 엄격한 트리).
 * 패스는 노드를 제자리 수정하지 않고 새 노드를 돌려준다.
 */

import type { OutputObject } from '../output/types.js';

export type FieldGroup = 'properties' | 'geometry' | 'layout' | 'style' | 'text';

/** 출력 순서이기도 하다 */
export const FIELD_GROUPS: readonly FieldGroup[] = ['properties', 'geometry', 'layout', 'style', 'text'];

export interface DesignNode {
  /** 빌드 한 번 안에서 고유한 전위 순회 번호. 패스 간 노드 대응에 쓴다 */
  key: number;
  /** guid("session:local") 또는 id 필드. 메타데이터 제거 후 null */
  id: string | null;
  /** 노드 종류 (FRAME, TEXT, …). type 필드가 없으면 null */
  type: string | null;
  /** 알려진 노드 종류가 아님: 모든 필드가 properties 에 그대로 있다 */
  opaque: boolean;
  internalOnly: boolean;
  properties: OutputObject;
  geometry: OutputObject;
  layout: OutputObject;
  style: OutputObject;
  text: OutputObject;
  /** keepExtras 일 때만. 노드 의미가 없는 부기 필드 */
  extras: OutputObject | null;
  children: DesignNode[];
}

export interface DesignDocument {
  root: DesignNode;
  /** 부모에 연결되지 못한 flat 항목의 id (또는 #인덱스) */
  orphans: string[];
  /** keepExtras 일 때 루트 메시지의 부기 필드 */
  extras: OutputObject | null;
}

export function emptyNode(key: number): DesignNode {
  return {
    key,
    id: null,
    type: null,
    opaque: true,
    internalOnly: false,
    properties: {},
    geometry: {},
    layout: {},
    style: {},
    text: {},
    extras: null,
    children: [],
  };
}

/** 필드 그룹만 교체한 새 노드 (자식은 공유) */
export function withGroups(
  node: DesignNode,
  update: (group: OutputObject, name: FieldGroup) => OutputObject,
): DesignNode {
  return {
    ...node,
    properties: update(node.properties, 'properties'),
    geometry: update(node.geometry, 'geometry'),
    layout: update(node.layout, 'layout'),
    style: update(node.style, 'style'),
    text: update(node.text, 'text'),
  };
}

export function replaceGroup(node: DesignNode, group: FieldGroup, fields: OutputObject): DesignNode {
  const next = { ...node };
  next[group] = fields;
  return next;
}

/** 후위 순회로 트리 전체를 다시 만든다 */
export function mapTree(node: DesignNode, fn: (node: DesignNode) => DesignNode): DesignNode {
  return fn({ ...node, children: node.children.map(child => mapTree(child, fn)) });
}

export function walkTree(node: DesignNode, visit: (node: DesignNode, depth: number) => void, depth = 0): void {
  visit(node, depth);
  for (const child of node.children) walkTree(child, visit, depth + 1);
}

export function countNodes(node: DesignNode): number {
  let count = 0;
  walkTree(node, () => {
    count++;
  });
  return count;
}

export function fieldCount(node: DesignNode): number {
  return FIELD_GROUPS.reduce((sum, group) => sum + Object.keys(node[group]).length, 0);
}

export function indexByKey(root: DesignNode): Map<number, DesignNode> {
  const index = new Map<number, DesignNode>();
  walkTree(root, node => {
    index.set(node.key, node);
  });
  return index;
}
