/**
 * 노드 트리 빌더
 *
 * 제네릭 타입 트리의 루트 레코드 → DesignNode 계층
 *
 * 두 가지 문서 형태:
 *   hierarchical — 루트 레코드가 곧 루트 노드. 자식은 childFields 에 선언된 필드에서
 *   flat         — 루트 메시지의 nodeChanges[] 항목을 parentIndex.guid 로 부모에 연결.
 *                  형제는 parentIndex.position 문자열 순 (안정 정렬)
 *
 * 부기 필드(extraFields)는 keepExtras 일 때만 extras 에 남고, 아니면 여기서 버려진다.
 * 알려진 노드 종류가 아니면 opaque 노드: 모든 필드를 properties 에 그대로 두고 자식은 유지.
 */

import catalog from './node-catalog.json' with { type: 'json' };
import { resolveObject, type ContentOptions } from '../content/resolve.js';
import { valueToOutput } from '../output/output-tree.js';
import type { OutputObject } from '../output/types.js';
import { fieldNumber, fieldRecords, fieldString, isRecord, type RecordValue, type Value } from '../decoder/value.js';
import { logger } from '../utils/logger.js';
import type { FigJsonError } from '../utils/errors.js';
import { emptyNode, type DesignDocument, type DesignNode, type FieldGroup } from './node.js';

export interface BuildOptions {
  /** hierarchical 문서에서 자식 목록으로 읽을 필드 (기본 ['children']) */
  childFields?: readonly string[];
  keepExtras?: boolean;
  /** <name>Blob 인덱스를 파싱된 blob 으로 치환 (기본 true) */
  resolveBlobs?: boolean;
}

export const DEFAULT_CHILD_FIELDS: readonly string[] = ['children'];

export const NODE_TYPES: ReadonlySet<string> = new Set(catalog.nodeTypes);
export const EXTRA_FIELDS: ReadonlySet<string> = new Set(catalog.extraFields);

const FIELD_GROUP_OF: ReadonlyMap<string, FieldGroup> = new Map<string, FieldGroup>([
  ...catalog.fieldGroups.geometry.map((name): [string, FieldGroup] => [name, 'geometry']),
  ...catalog.fieldGroups.style.map((name): [string, FieldGroup] => [name, 'style']),
  ...catalog.fieldGroups.text.map((name): [string, FieldGroup] => [name, 'text']),
  ...catalog.fieldGroups.layout.map((name): [string, FieldGroup] => [name, 'layout']),
]);

export function fieldGroupOf(name: string): FieldGroup {
  return FIELD_GROUP_OF.get(name) ?? 'properties';
}

/** flat 문서의 루트 메시지에서 노드가 아닌 부분 */
const FLAT_STRUCTURE_FIELDS: ReadonlySet<string> = new Set(['nodeChanges', 'blobs']);

// ─── 공개 API ─────────────────────────────────────────────────────────────────

export function buildDocument(root: RecordValue, options: BuildOptions = {}): DesignDocument {
  const builder = new NodeBuilder(options, collectBlobs(root));
  return root.fields.has('nodeChanges') ? builder.buildFlat(root) : builder.buildHierarchical(root);
}

/** GUID 레코드 → "sessionID:localID" */
export function guidToString(value: Value | undefined): string | null {
  if (!isRecord(value)) return null;
  const session = fieldNumber(value, 'sessionID');
  const local = fieldNumber(value, 'localID');
  return session === undefined || local === undefined ? null : `${session}:${local}`;
}

function collectBlobs(root: RecordValue): Uint8Array[] {
  return fieldRecords(root, 'blobs').map(blob => {
    const bytes = blob.fields.get('bytes');
    if (bytes?.kind === 'bytes') return bytes.value;
    if (bytes?.kind === 'array') {
      return Uint8Array.from(bytes.items, item => (item.kind === 'int' ? Number(item.value) : 0));
    }
    return new Uint8Array(0);
  });
}

// ─── 구현 ─────────────────────────────────────────────────────────────────────

interface FlatLink {
  index: number;
  position: string;
}

class NodeBuilder {
  private nextKey = 0;
  private readonly childFields: ReadonlySet<string>;
  private readonly keepExtras: boolean;
  private readonly content: ContentOptions;

  constructor(options: BuildOptions, blobs: readonly Uint8Array[]) {
    this.childFields = new Set(options.childFields ?? DEFAULT_CHILD_FIELDS);
    this.keepExtras = options.keepExtras ?? false;
    this.content = { blobs, resolveBlobs: options.resolveBlobs ?? true };
  }

  buildHierarchical(root: RecordValue): DesignDocument {
    return { root: this.buildSubtree(root), orphans: [], extras: null };
  }

  private buildSubtree(record: RecordValue): DesignNode {
    const node = this.buildNode(record, this.childFields);
    for (const name of this.childFields) {
      for (const child of fieldRecords(record, name)) {
        node.children.push(this.buildSubtree(child));
      }
    }
    return node;
  }

  buildFlat(message: RecordValue): DesignDocument {
    const entries = fieldRecords(message, 'nodeChanges');
    const ids = entries.map(entry => guidToString(entry.fields.get('guid')));

    const rootIndex = entries.findIndex(entry => !isRecord(entry.fields.get('parentIndex')));
    if (rootIndex < 0) {
      const err: FigJsonError = {
        code: 'TREE_INVALID',
        reason: `parentIndex 없는 루트 노드가 없음 (nodeChanges ${entries.length}개)`,
      };
      throw err;
    }

    const childrenOf = new Map<string, FlatLink[]>();
    entries.forEach((entry, index) => {
      const parentIndex = entry.fields.get('parentIndex');
      if (!isRecord(parentIndex)) return;
      const parentId = guidToString(parentIndex.fields.get('guid'));
      if (parentId === null) return;
      const links = childrenOf.get(parentId) ?? [];
      links.push({ index, position: fieldString(parentIndex, 'position') ?? '' });
      childrenOf.set(parentId, links);
    });
    for (const links of childrenOf.values()) {
      links.sort((a, b) => (a.position < b.position ? -1 : a.position > b.position ? 1 : 0));
    }

    const visited = new Set<number>();
    const consumed = new Set(['guid', 'parentIndex']);
    const build = (index: number): DesignNode | null => {
      const entry = entries[index];
      if (entry === undefined || visited.has(index)) return null;
      visited.add(index);
      const node = this.buildNode(entry, consumed);
      const id = ids[index];
      for (const link of (id != null ? childrenOf.get(id) : undefined) ?? []) {
        const child = build(link.index);
        if (child !== null) node.children.push(child);
      }
      return node;
    };

    const root = build(rootIndex);
    if (root === null) {
      const err: FigJsonError = { code: 'TREE_INVALID', reason: '루트 노드를 만들 수 없음' };
      throw err;
    }

    const orphans: string[] = [];
    entries.forEach((_, index) => {
      if (!visited.has(index)) orphans.push(ids[index] ?? `#${index}`);
    });
    if (orphans.length > 0) {
      logger.debug(`부모에 연결되지 않은 노드 ${orphans.length}개: ${orphans.slice(0, 10).join(', ')}`);
    }

    let extras: OutputObject | null = null;
    if (this.keepExtras) {
      extras = {};
      for (const [name, value] of message.fields) {
        if (!FLAT_STRUCTURE_FIELDS.has(name)) extras[name] = valueToOutput(value);
      }
    }

    return { root, orphans, extras };
  }

  /**
   * 레코드 하나 → 자식 없는 노드
   * @param structural 노드 필드로 옮기지 않을 구조 필드 (자식 목록, guid 등)
   */
  private buildNode(record: RecordValue, structural: ReadonlySet<string>): DesignNode {
    const node = emptyNode(this.nextKey++);

    const typeValue = record.fields.get('type');
    const type =
      typeValue?.kind === 'enum' ? typeValue.name : typeValue?.kind === 'string' ? typeValue.value : null;
    node.type = type;
    node.opaque = type === null || !NODE_TYPES.has(type);

    const guid = guidToString(record.fields.get('guid'));
    const idValue = record.fields.get('id');
    if (guid !== null) {
      node.id = guid;
    } else if (idValue?.kind === 'int' || idValue?.kind === 'string') {
      node.id = String(idValue.value);
    }
    // 식별자를 정했으면 id 필드는 출력에 남기지 않는다
    const idConsumed = node.id !== null;

    let extras: OutputObject | null = null;

    for (const [name, value] of record.fields) {
      if (structural.has(name)) continue;
      if (name === 'type' && type !== null) continue;
      if (name === 'id' && idConsumed) continue;
      if (name === 'guid' && guid !== null) continue;
      if (name === 'internalOnly') {
        node.internalOnly = value.kind === 'bool' && value.value;
        continue;
      }
      if (EXTRA_FIELDS.has(name)) {
        if (this.keepExtras) {
          extras ??= {};
          extras[name] = valueToOutput(value);
        }
        continue;
      }
      const group: FieldGroup = node.opaque ? 'properties' : fieldGroupOf(name);
      node[group][name] = valueToOutput(value);
    }

    node.properties = resolveObject(node.properties, this.content);
    node.geometry = resolveObject(node.geometry, this.content);
    node.layout = resolveObject(node.layout, this.content);
    node.style = resolveObject(node.style, this.content);
    node.text = resolveObject(node.text, this.content);
    node.extras = extras;
    return node;
  }
}
