// @fig-json/core

// 유틸리티
export * from './utils/logger.js';
export * from './utils/errors.js';

// 설정
export * from './config.js';

// ── 바이트 입출력 ────────────────────────────────────────────────────────────
export { ByteReader } from './binary/byte-reader.js';
export { ByteWriter } from './binary/byte-writer.js';

// ── 스키마 ──────────────────────────────────────────────────────────────────
export * from './schema/types.js';
export { BOOTSTRAP_SCHEMA, BOOTSTRAP_IDS } from './schema/bootstrap.js';
export { validateSchema, MAX_FIELD_TAG } from './schema/validate.js';
export { defineSchema, type DefinitionSpec, type FieldSpec } from './schema/define.js';
export { decodeSchema, encodeSchema } from './schema/schema-decoder.js';

// ── 데이터 디코더 / 인코더 ───────────────────────────────────────────────────
export * from './decoder/value.js';
export { WireKind, fieldKey, splitFieldKey, wireKindOf } from './decoder/wire.js';
export {
  decodeValue,
  decodeRoot,
  findRootType,
  DEFAULT_MAX_DEPTH,
  MAX_EMPTY_STRUCT_ELEMENTS,
  type DecodeOptions,
  type UnknownField,
} from './decoder/data-decoder.js';
export { encodeValue, isPlainRecord, type PlainValue, type PlainRecord } from './decoder/data-encoder.js';

// ── 노드 트리 ────────────────────────────────────────────────────────────────
export * from './tree/node.js';
export {
  buildDocument,
  guidToString,
  fieldGroupOf,
  NODE_TYPES,
  EXTRA_FIELDS,
  DEFAULT_CHILD_FIELDS,
  type BuildOptions,
} from './tree/node-builder.js';
export { parseBlob, parseCommands, parseVectorNetwork } from './content/blob-parser.js';
export { resolveContent, resolveObject, hashToHex, IMAGE_DIR, type ContentOptions } from './content/resolve.js';

// ── 변환 파이프라인 ──────────────────────────────────────────────────────────
export * from './transform/types.js';
export {
  DEFAULT_PIPELINE_CONFIG,
  DEFAULT_VALUES,
  METADATA_FIELDS,
  DEFAULT_REWRITES,
  PRESERVED_FIELDS,
  REDUNDANT_RULES,
  REWRITE_RULES,
} from './transform/defaults.js';
export { TransformPipeline, createPassContext } from './transform/pipeline.js';
export { DefaultStrippingPass } from './transform/passes/default-stripping.js';
export { MetadataRemovalPass } from './transform/passes/metadata-removal.js';
export { RedundantFieldRemovalPass, REDUNDANT_RULE_TABLE } from './transform/passes/redundant-field-removal.js';
export { InternalNodeFilterPass } from './transform/passes/internal-node-filter.js';
export { GeometryPreservationPass } from './transform/passes/geometry-preservation.js';
export {
  ValueRewritePass,
  REWRITE_RULE_TABLE,
  colorToHex,
  decomposeMatrix,
  type RewriteRule,
} from './transform/passes/value-rewrite.js';

// ── 출력 ────────────────────────────────────────────────────────────────────
export * from './output/types.js';
export { valueToOutput, recordToOutput, nodeToOutput } from './output/output-tree.js';

// ── 컨테이너 ────────────────────────────────────────────────────────────────
export * from './container/index.js';

// ── 변환 진입점 ──────────────────────────────────────────────────────────────
export {
  convertFig,
  convertFigFile,
  type ConvertOptions,
  type ConvertStats,
  type ConvertResult,
  type FigFileResult,
} from './convert.js';
