/**
 * 파이프라인 기본 설정
 *
 * 기본값 테이블은 스키마가 아니라 파이프라인 설정의 일부다.
 * figjson.config.yml 의 transform 섹션이 이 값들을 덮어쓴다.
 */

import type { DefaultEntry, PipelineConfig, RedundantRuleName, RewriteRuleName } from './types.js';

export const DEFAULT_VALUES: readonly DefaultEntry[] = [
  { field: 'blendMode', value: 'NORMAL' },
  { field: 'opacity', value: 1 },
  { field: 'visible', value: true },
  { field: 'rotation', value: 0 },
  { field: 'cornerSmoothing', value: 0 },
  { field: 'letterSpacing', value: { value: 0, units: 'PERCENT' } },
  { field: 'lineHeight', value: { value: 100, units: 'PERCENT' } },
  { field: 'textDecoration', value: 'NONE' },
  { field: 'textCase', value: 'ORIGINAL' },
  { field: 'paragraphSpacing', value: 0, nodeTypes: ['TEXT'] },
  { field: 'paragraphIndent', value: 0, nodeTypes: ['TEXT'] },
  // textData.lines[] 항목
  { field: 'indentationLevel', value: 0 },
  { field: 'isFirstLineOfList', value: false },
  { field: 'lineType', value: 'PLAIN' },
  { field: 'listStartOffset', value: 0 },
  { field: 'stackChildPrimaryGrow', value: 0 },
  { field: 'stackChildAlignSelf', value: 'AUTO' },
  { field: 'stackPositioning', value: 'AUTO' },
  { field: 'mask', value: false },
];

export const METADATA_FIELDS: readonly string[] = [
  'guid',
  'guidPath',
  'editInfo',
  'pluginData',
  'pluginRelaunchData',
  'phase',
  'userFacingVersion',
  'exportSettings',
  'overriddenSymbolID',
  'detachedSymbolId',
  // 텍스트 레이아웃 캐시
  'glyphs',
  'baselines',
  'derivedLines',
  'fontMetaData',
  'logicalIndexToCharacterOffsetMap',
  'fontVersion',
  'textBidiVersion',
  'textExplicitLayoutVersion',
  'textUserLayoutVersion',
  'emojiImageSet',
  // 래스터 썸네일
  'thumbHash',
  'thumbnailInfo',
  'imageThumbnail',
];

export const REDUNDANT_RULES: readonly RedundantRuleName[] = [
  'cornerRadii',
  'padding',
  'textLayoutSize',
  'boundingBox',
];

/** 적용 순서이기도 하다 */
export const REWRITE_RULES: readonly RewriteRuleName[] = [
  'invisiblePaints',
  'emptyPaintArrays',
  'colorToCss',
  'matrixToCss',
  'emptyObjects',
];

/** 값의 모양을 바꾸는 colorToCss / matrixToCss 는 설정으로 켠다 */
export const DEFAULT_REWRITES: readonly RewriteRuleName[] = ['invisiblePaints', 'emptyPaintArrays', 'emptyObjects'];

export const PRESERVED_FIELDS: readonly string[] = [
  'fillGeometry',
  'strokeGeometry',
  'vectorData',
  'vectorNetwork',
  'vectorNetworkBlob',
  'commands',
  'commandsBlob',
  'image',
  'animatedImage',
  'video',
];

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  defaults: DEFAULT_VALUES,
  metadataFields: METADATA_FIELDS,
  redundantRules: REDUNDANT_RULES,
  rewrites: DEFAULT_REWRITES,
  preserve: PRESERVED_FIELDS,
};
