import { describe, it, expect } from 'vitest';
import { nodeToOutput, recordToOutput, valueToOutput } from '../../output/output-tree.js';
import { outputEquals } from '../../output/types.js';
import type { RecordValue, Value } from '../../decoder/value.js';
import { makeNode } from '../helpers.js';

describe('valueToOutput', () => {
  it('maps scalar values to JSON', () => {
    expect(valueToOutput({ kind: 'null' })).toBeNull();
    expect(valueToOutput({ kind: 'bool', value: false })).toBe(false);
    expect(valueToOutput({ kind: 'int', value: -3 })).toBe(-3);
    expect(valueToOutput({ kind: 'int', value: 2n ** 63n - 1n })).toBe('9223372036854775807');
    expect(valueToOutput({ kind: 'float', value: 0.25, precision: 32 })).toBe(0.25);
    expect(valueToOutput({ kind: 'float', value: Number.NaN, precision: 64 })).toBeNull();
    expect(valueToOutput({ kind: 'float', value: -Infinity, precision: 64 })).toBeNull();
    expect(valueToOutput({ kind: 'string', value: 'é' })).toBe('é');
    expect(valueToOutput({ kind: 'bytes', value: Uint8Array.from([1, 2, 3]) })).toBe('AQID');
    expect(valueToOutput({ kind: 'enum', typeName: 'BlendMode', value: 1, name: 'MULTIPLY' })).toBe('MULTIPLY');
  });

  it('maps records in field order', () => {
    const record: RecordValue = {
      kind: 'record',
      typeId: 0,
      typeName: 'Point',
      fields: new Map<string, Value>([
        ['y', { kind: 'int', value: 2 }],
        ['x', { kind: 'int', value: 1 }],
        ['tags', { kind: 'array', items: [{ kind: 'string', value: 'a' }] }],
      ]),
    };
    const output = recordToOutput(record);
    expect(Object.keys(output)).toEqual(['y', 'x', 'tags']);
    expect(output).toEqual({ y: 2, x: 1, tags: ['a'] });
  });
});

describe('nodeToOutput', () => {
  it('orders keys by group and omits empty parts', () => {
    const node = makeNode(0, {
      id: '1:2',
      type: 'TEXT',
      internalOnly: true,
      text: { fontSize: 12 },
      style: { opacity: 0.5 },
      properties: { name: 'a' },
      geometry: { size: { x: 1, y: 2 } },
      layout: { stackMode: 'NONE' },
      extras: { editInfo: {} },
      children: [makeNode(1, { type: null, id: null })],
    });
    const output = nodeToOutput(node);
    expect(Object.keys(output)).toEqual([
      'id',
      'type',
      'internalOnly',
      'name',
      'size',
      'stackMode',
      'opacity',
      'fontSize',
      'extras',
      'children',
    ]);
    expect(output['children']).toEqual([{}]);
  });

  it('omits empty extras', () => {
    expect(nodeToOutput(makeNode(0, { extras: {} }))).toEqual({ type: 'FRAME' });
  });
});

describe('outputEquals', () => {
  it('compares structurally with exact numbers', () => {
    expect(outputEquals({ a: [1, { b: null }] }, { a: [1, { b: null }] })).toBe(true);
    expect(outputEquals({ a: 1 }, { a: 1.0000001 })).toBe(false);
    expect(outputEquals({ a: 1 }, { a: 1, b: 2 })).toBe(false);
    expect(outputEquals([1, 2], [1])).toBe(false);
    expect(outputEquals({ a: 1 }, [1])).toBe(false);
    expect(outputEquals(null, {})).toBe(false);
  });
});
