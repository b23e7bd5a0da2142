import { describe, it, expect } from 'vitest';
import { createPassContext } from '../../transform/pipeline.js';
import { DEFAULT_PIPELINE_CONFIG } from '../../transform/defaults.js';
import { DefaultStrippingPass } from '../../transform/passes/default-stripping.js';
import { MetadataRemovalPass } from '../../transform/passes/metadata-removal.js';
import { RedundantFieldRemovalPass, REDUNDANT_RULE_TABLE } from '../../transform/passes/redundant-field-removal.js';
import { InternalNodeFilterPass } from '../../transform/passes/internal-node-filter.js';
import { GeometryPreservationPass } from '../../transform/passes/geometry-preservation.js';
import { ValueRewritePass, colorToHex, decomposeMatrix } from '../../transform/passes/value-rewrite.js';
import type { DesignNode } from '../../tree/node.js';
import type { PipelineConfig, RewriteRuleName, TransformPass } from '../../transform/types.js';
import { makeNode } from '../helpers.js';

function runPass(pass: TransformPass, root: DesignNode, config: PipelineConfig = DEFAULT_PIPELINE_CONFIG): DesignNode {
  return pass.run(root, createPassContext(config, root));
}

describe('DefaultStrippingPass', () => {
  const pass = new DefaultStrippingPass();

  it('removes fields equal to their default', () => {
    const node = makeNode(0, {
      style: { opacity: 1, blendMode: 'NORMAL', visible: true },
      geometry: { rotation: 0, size: { x: 1, y: 1 } },
    });
    const result = runPass(pass, node);
    expect(result.style).toEqual({});
    expect(result.geometry).toEqual({ size: { x: 1, y: 1 } });
  });

  it('compares numbers exactly', () => {
    const node = makeNode(0, { style: { opacity: 0.9999999, blendMode: 'MULTIPLY' } });
    expect(runPass(pass, node).style).toEqual({ opacity: 0.9999999, blendMode: 'MULTIPLY' });
  });

  it('compares object defaults structurally', () => {
    const node = makeNode(0, {
      type: 'TEXT',
      text: {
        letterSpacing: { value: 0, units: 'PERCENT' },
        lineHeight: { value: 120, units: 'PERCENT' },
      },
    });
    expect(runPass(pass, node).text).toEqual({ lineHeight: { value: 120, units: 'PERCENT' } });
  });

  it('applies typed entries only to top-level fields of matching nodes', () => {
    const text = makeNode(0, { type: 'TEXT', text: { paragraphSpacing: 0 } });
    const frame = makeNode(1, { type: 'FRAME', text: { paragraphSpacing: 0 } });
    const nested = makeNode(2, { type: 'TEXT', text: { style: { paragraphSpacing: 0 } } });
    expect(runPass(pass, text).text).toEqual({});
    expect(runPass(pass, frame).text).toEqual({ paragraphSpacing: 0 });
    expect(runPass(pass, nested).text).toEqual({ style: { paragraphSpacing: 0 } });
  });

  it('strips defaults inside nested objects and arrays', () => {
    const node = makeNode(0, {
      style: { fillPaints: [{ type: 'SOLID', opacity: 1, visible: true, blendMode: 'MULTIPLY' }] },
      text: { textData: { lines: [{ lineType: 'PLAIN', indentationLevel: 0 }, { lineType: 'BULLET' }] } },
    });
    const result = runPass(pass, node);
    expect(result.style).toEqual({ fillPaints: [{ type: 'SOLID', blendMode: 'MULTIPLY' }] });
    expect(result.text).toEqual({ textData: { lines: [{}, { lineType: 'BULLET' }] } });
  });

  it('never touches preserved fields', () => {
    const node = makeNode(0, { style: { image: { opacity: 1 } } });
    expect(runPass(pass, node).style).toEqual({ image: { opacity: 1 } });
  });

  it('visits every node without mutating the input', () => {
    const child = makeNode(1, { style: { opacity: 1 } });
    const root = makeNode(0, { style: { opacity: 1 }, children: [child] });
    const result = runPass(pass, root);
    expect(result.children[0]?.style).toEqual({});
    expect(root.style).toEqual({ opacity: 1 });
    expect(child.style).toEqual({ opacity: 1 });
  });
});

describe('MetadataRemovalPass', () => {
  const pass = new MetadataRemovalPass();

  it('removes metadata at any depth and clears ids', () => {
    const node = makeNode(0, {
      id: '1:2',
      properties: { name: 'n', pluginData: [{ key: 'k' }] },
      text: { textData: { characters: 'hi', glyphs: [1, 2], baselines: [] } },
      style: { fillPaints: [{ type: 'IMAGE', imageThumbnail: { filename: 'images/ab' } }] },
    });
    const result = runPass(pass, node);
    expect(result.id).toBeNull();
    expect(result.properties).toEqual({ name: 'n' });
    expect(result.text).toEqual({ textData: { characters: 'hi' } });
    expect(result.style).toEqual({ fillPaints: [{ type: 'IMAGE' }] });
  });

  it('uses the configured field list', () => {
    const node = makeNode(0, { properties: { name: 'n', secret: 1, editInfo: {} } });
    const config = { ...DEFAULT_PIPELINE_CONFIG, metadataFields: ['secret'] };
    expect(runPass(pass, node, config).properties).toEqual({ name: 'n', editInfo: {} });
  });
});

describe('RedundantFieldRemovalPass', () => {
  const pass = new RedundantFieldRemovalPass();

  it('removes corner radii equal to cornerRadius', () => {
    const node = makeNode(0, {
      geometry: {
        cornerRadius: 4,
        rectangleTopLeftCornerRadius: 4,
        rectangleTopRightCornerRadius: 4,
        rectangleBottomLeftCornerRadius: 8,
        rectangleBottomRightCornerRadius: 4,
      },
    });
    expect(runPass(pass, node).geometry).toEqual({ cornerRadius: 4, rectangleBottomLeftCornerRadius: 8 });
  });

  it('removes right and bottom padding equal to the axis padding', () => {
    const node = makeNode(0, {
      layout: {
        stackHorizontalPadding: 8,
        stackPaddingRight: 8,
        stackVerticalPadding: 4,
        stackPaddingBottom: 6,
      },
    });
    expect(runPass(pass, node).layout).toEqual({
      stackHorizontalPadding: 8,
      stackVerticalPadding: 4,
      stackPaddingBottom: 6,
    });
  });

  it('removes a derived text layout size equal to size', () => {
    const node = makeNode(0, {
      type: 'TEXT',
      geometry: { size: { x: 40, y: 12 } },
      text: { derivedTextData: { layoutSize: { x: 40, y: 12 }, truncated: false } },
    });
    expect(runPass(pass, node).text).toEqual({ derivedTextData: { truncated: false } });
  });

  it('removes the bounding box only when a transform is present', () => {
    const box = { x: 5, y: 5, width: 10, height: 20 };
    const withTransform = makeNode(0, {
      geometry: { size: { x: 10, y: 20 }, transform: { m02: 5, m12: 5 }, absoluteBoundingBox: box },
    });
    const withoutTransform = makeNode(1, { geometry: { size: { x: 10, y: 20 }, absoluteBoundingBox: box } });
    expect(runPass(pass, withTransform).geometry).toEqual({ size: { x: 10, y: 20 }, transform: { m02: 5, m12: 5 } });
    expect(runPass(pass, withoutTransform).geometry).toEqual({ size: { x: 10, y: 20 }, absoluteBoundingBox: box });
  });

  it('runs only the configured rules', () => {
    const node = makeNode(0, { geometry: { cornerRadius: 2, rectangleTopLeftCornerRadius: 2 } });
    const config = { ...DEFAULT_PIPELINE_CONFIG, redundantRules: [] };
    expect(runPass(pass, node, config).geometry).toEqual({ cornerRadius: 2, rectangleTopLeftCornerRadius: 2 });
  });

  it('exposes rules that report paths', () => {
    const node = makeNode(0, { layout: { stackHorizontalPadding: 1, stackPaddingRight: 1 } });
    expect(REDUNDANT_RULE_TABLE.padding(node)).toEqual([['stackPaddingRight']]);
    expect(REDUNDANT_RULE_TABLE.cornerRadii(node)).toEqual([]);
  });
});

describe('InternalNodeFilterPass', () => {
  const pass = new InternalNodeFilterPass();

  it('drops internal subtrees and keeps sibling order', () => {
    const root = makeNode(0, {
      children: [
        makeNode(1, { properties: { name: 'a' } }),
        makeNode(2, { internalOnly: true, children: [makeNode(3)] }),
        makeNode(4, { properties: { name: 'c' } }),
      ],
    });
    const result = runPass(pass, root);
    expect(result.children.map(child => child.key)).toEqual([1, 4]);
  });

  it('drops opaque nodes emptied by earlier passes', () => {
    const source = makeNode(0, {
      children: [
        makeNode(1, { opaque: true, type: 'WIDGET', properties: { editInfo: {} } }),
        makeNode(2, { opaque: true, type: 'WIDGET' }),
        makeNode(3, { opaque: false, properties: { editInfo: {} } }),
      ],
    });
    const emptied = makeNode(0, {
      children: [
        makeNode(1, { opaque: true, type: 'WIDGET' }),
        makeNode(2, { opaque: true, type: 'WIDGET' }),
        makeNode(3, { opaque: false }),
      ],
    });
    const result = pass.run(emptied, createPassContext(DEFAULT_PIPELINE_CONFIG, source));
    expect(result.children.map(child => child.key)).toEqual([2, 3]);
  });

  it('never removes the root', () => {
    const root = makeNode(0, { internalOnly: true });
    expect(runPass(pass, root).key).toBe(0);
  });
});

describe('GeometryPreservationPass', () => {
  const pass = new GeometryPreservationPass();

  it('restores preserved fields removed by earlier passes', () => {
    const source = makeNode(0, {
      geometry: { commands: ['Z'], size: { x: 1, y: 1 } },
      style: { image: { filename: 'images/ab' } },
    });
    const stripped = makeNode(0, { geometry: { size: { x: 1, y: 1 } } });
    const result = pass.run(stripped, createPassContext(DEFAULT_PIPELINE_CONFIG, source));
    expect(result.geometry).toEqual({ size: { x: 1, y: 1 }, commands: ['Z'] });
    expect(result.style).toEqual({ image: { filename: 'images/ab' } });
  });

  it('does not restore non-preserved fields', () => {
    const source = makeNode(0, { style: { opacity: 1 } });
    const stripped = makeNode(0);
    expect(pass.run(stripped, createPassContext(DEFAULT_PIPELINE_CONFIG, source)).style).toEqual({});
  });
});

describe('ValueRewritePass', () => {
  const pass = new ValueRewritePass();
  const only = (...rewrites: RewriteRuleName[]): PipelineConfig => ({ ...DEFAULT_PIPELINE_CONFIG, rewrites });

  it('drops invisible paints', () => {
    const node = makeNode(0, {
      style: {
        fillPaints: [{ type: 'SOLID', visible: false }, { type: 'SOLID', color: '#000000' }],
        strokePaints: [{ type: 'SOLID', visible: false }],
      },
    });
    expect(runPass(pass, node, only('invisiblePaints')).style).toEqual({
      fillPaints: [{ type: 'SOLID', color: '#000000' }],
      strokePaints: [],
    });
  });

  it('drops empty paint arrays only', () => {
    const node = makeNode(0, { style: { fillPaints: [], strokePaints: [{ type: 'SOLID' }], effects: [] } });
    expect(runPass(pass, node, only('emptyPaintArrays')).style).toEqual({
      strokePaints: [{ type: 'SOLID' }],
      effects: [],
    });
  });

  it('removes paints emptied by the invisible paint rule', () => {
    const node = makeNode(0, { style: { strokePaints: [{ type: 'SOLID', visible: false }] } });
    expect(runPass(pass, node, only('emptyPaintArrays', 'invisiblePaints')).style).toEqual({});
  });

  it('converts colors to hex strings', () => {
    expect(colorToHex({ r: 1, g: 0, b: 0, a: 0.5 })).toBe('#ff000080');
    expect(colorToHex({ r: 0, g: 0.5, b: 1 })).toBe('#0080ff');
    expect(colorToHex({ r: 1.5, g: -1, b: 0, a: 1 })).toBe('#ff0000');
    expect(colorToHex({ x: 1, y: 2 })).toBeUndefined();

    const node = makeNode(0, {
      style: {
        backgroundColor: { r: 1, g: 1, b: 1, a: 1 },
        fillPaints: [{ type: 'GRADIENT_LINEAR', stops: [{ color: { r: 0, g: 0, b: 0, a: 1 }, position: 0 }] }],
      },
    });
    expect(runPass(pass, node, only('colorToCss')).style).toEqual({
      backgroundColor: '#ffffff',
      fillPaints: [{ type: 'GRADIENT_LINEAR', stops: [{ color: '#000000', position: 0 }] }],
    });
  });

  it('decomposes transform matrices', () => {
    expect(decomposeMatrix({ m00: 2, m01: 0, m02: 4, m10: 0, m11: 3, m12: 6 })).toEqual({
      x: 4,
      y: 6,
      rotation: 0,
      scaleX: 2,
      scaleY: 3,
      skewX: 0,
    });
    const quarter = decomposeMatrix({ m00: 0, m01: -1, m02: 0, m10: 1, m11: 0, m12: 0 });
    expect(quarter?.['rotation']).toBeCloseTo(90);
    expect(quarter?.['scaleX']).toBeCloseTo(1);
    expect(quarter?.['scaleY']).toBeCloseTo(1);

    const node = makeNode(0, {
      geometry: { transform: { m00: 1, m01: 0, m02: 5, m10: 0, m11: 1, m12: 7 } },
      layout: { transform: { m02: 5, m12: 5 } },
    });
    const result = runPass(pass, node, only('matrixToCss'));
    expect(result.geometry).toEqual({ transform: { x: 5, y: 7, rotation: 0, scaleX: 1, scaleY: 1, skewX: 0 } });
    expect(result.layout).toEqual({ transform: { m02: 5, m12: 5 } });
  });

  it('removes empty objects from the innermost level out', () => {
    const node = makeNode(0, {
      properties: { name: 'n', outer: { inner: {} } },
      text: { textData: { lines: [{}, { lineType: 'BULLET' }], styleOverrideTable: {} }, derivedTextData: {} },
    });
    const result = runPass(pass, node, only('emptyObjects'));
    expect(result.properties).toEqual({ name: 'n' });
    expect(result.text).toEqual({ textData: { lines: [{ lineType: 'BULLET' }] } });
  });

  it('leaves preserved fields alone', () => {
    const node = makeNode(0, { style: { image: {}, fillPaints: [] } });
    expect(runPass(pass, node, only('emptyObjects', 'emptyPaintArrays')).style).toEqual({ image: {} });
  });

  it('does nothing without rewrites', () => {
    const node = makeNode(0, { style: { fillPaints: [], color: { r: 0, g: 0, b: 0 } } });
    expect(runPass(pass, node, only()).style).toEqual({ fillPaints: [], color: { r: 0, g: 0, b: 0 } });
  });
});
