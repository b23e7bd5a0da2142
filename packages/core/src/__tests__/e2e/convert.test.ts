import { describe, it, expect } from 'vitest';
import UZIP from 'uzip';
import { convertFig, convertFigFile } from '../../convert.js';
import { encodeValue } from '../../decoder/data-encoder.js';
import { defineSchema } from '../../schema/define.js';
import { encodeSchema } from '../../schema/schema-decoder.js';
import { DESIGN_SCHEMA, figFile, guid, thrown } from '../helpers.js';

const TREE_SCHEMA = defineSchema([
  {
    name: 'Message',
    kind: 'message',
    fields: [
      { name: 'id', tag: 0, type: 'int' },
      { name: 'children', tag: 1, type: 'Message', modifier: 'array' },
    ],
  },
]);

/** 같은 모양에 태그 5 필드가 하나 더 있는 새 버전 */
const NEWER_TREE_SCHEMA = defineSchema([
  {
    name: 'Message',
    kind: 'message',
    fields: [
      { name: 'id', tag: 0, type: 'int' },
      { name: 'children', tag: 1, type: 'Message', modifier: 'array' },
      { name: 'label', tag: 5, type: 'string' },
    ],
  },
]);

const MESSAGE_ID = 0;

describe('convertFig with a self-referencing schema', () => {
  const data = encodeValue(TREE_SCHEMA, MESSAGE_ID, { id: 1, children: [{ id: 2 }, { id: 3 }] });
  const result = convertFig(encodeSchema(TREE_SCHEMA), data, { outputs: { transformed: true, raw: true } });

  it('decodes a two-level tree', () => {
    expect(result.raw).toEqual({ id: 1, children: [{ id: 2 }, { id: 3 }] });
    expect(result.stats).toEqual({
      definitions: 1,
      rootType: 'Message',
      nodes: 3,
      outputNodes: 3,
      unknownFields: 0,
      orphans: 0,
    });
  });

  it('transforms to the raw shape without ids', () => {
    expect(result.output).toEqual({ children: [{}, {}] });
  });

  it('skips fields the schema does not know', () => {
    const newer = encodeValue(NEWER_TREE_SCHEMA, MESSAGE_ID, { id: 1, label: 'new', children: [{ id: 2 }] });
    const older = convertFig(encodeSchema(TREE_SCHEMA), newer, { outputs: { raw: true, transformed: false } });
    expect(older.stats.unknownFields).toBe(1);
    expect(older.raw).toEqual({ id: 1, children: [{ id: 2 }] });
    expect(older.output).toBeUndefined();
  });
});

describe('convertFig with a design document', () => {
  const messageId = DESIGN_SCHEMA.typeByName('Message')?.id ?? -1;
  const schemaBytes = encodeSchema(DESIGN_SCHEMA);
  const data = encodeValue(DESIGN_SCHEMA, messageId, {
    type: 'NODE_CHANGES',
    sessionID: 9,
    nodeChanges: [
      { guid: guid(0, 1), type: 'DOCUMENT', name: 'Doc', opacity: 0.5, blendMode: 'NORMAL' },
      { guid: guid(0, 2), parentIndex: { guid: guid(0, 1), position: 'a' }, type: 'CANVAS', blendMode: 'MULTIPLY' },
    ],
  });

  it('keeps default values in raw output only', () => {
    const result = convertFig(schemaBytes, data, { outputs: { transformed: true, raw: true } });
    expect(result.raw).toEqual({
      type: 'NODE_CHANGES',
      sessionID: 9,
      nodeChanges: [
        { guid: { sessionID: 0, localID: 1 }, type: 'DOCUMENT', name: 'Doc', opacity: 0.5, blendMode: 'NORMAL' },
        {
          guid: { sessionID: 0, localID: 2 },
          parentIndex: { guid: { sessionID: 0, localID: 1 }, position: 'a' },
          type: 'CANVAS',
          blendMode: 'MULTIPLY',
        },
      ],
    });
    expect(result.output).toEqual({
      type: 'DOCUMENT',
      name: 'Doc',
      opacity: 0.5,
      children: [{ type: 'CANVAS', blendMode: 'MULTIPLY' }],
    });
  });

  it('carries root message bookkeeping into extras when asked', () => {
    const result = convertFig(schemaBytes, data, { build: { keepExtras: true } });
    expect(result.output?.['extras']).toEqual({ type: 'NODE_CHANGES', sessionID: 9 });
    expect(result.raw).toBeUndefined();
  });

  it('converts a whole .fig file', () => {
    const file = figFile([UZIP.deflateRaw(schemaBytes), UZIP.deflateRaw(data)], 'fig-kiwi', 70);
    const result = convertFigFile(file);
    expect(result.fileType).toBe('figma');
    expect(result.version).toBe(70);
    expect(result.stats.nodes).toBe(2);
    expect(result.output?.['name']).toBe('Doc');
    expect(result.images.size).toBe(0);
  });

  it('honors an explicit root type', () => {
    expect(thrown(() => convertFig(schemaBytes, data, { rootType: 'Nope' }))).toEqual({
      code: 'UNKNOWN_ROOT_TYPE',
      root: 'Nope',
      available: DESIGN_SCHEMA.size,
    });
  });
});
