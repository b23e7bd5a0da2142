/**
 * 변환 진입점
 *
 * 스키마 bytes + 데이터 bytes → 출력 트리.
 * 디코드는 파일당 한 번. 변환 출력과 raw 출력 모두 같은 제네릭 트리에서 만든다.
 */

import { readFigFile, type FileType } from './container/index.js';
import { decodeValue, findRootType, type UnknownField } from './decoder/data-decoder.js';
import { recordToOutput, nodeToOutput } from './output/output-tree.js';
import type { OutputObject } from './output/types.js';
import { decodeSchema } from './schema/schema-decoder.js';
import { DEFAULT_PIPELINE_CONFIG } from './transform/defaults.js';
import { TransformPipeline } from './transform/pipeline.js';
import type { PipelineConfig } from './transform/types.js';
import { buildDocument, type BuildOptions } from './tree/node-builder.js';
import { countNodes } from './tree/node.js';
import { logger } from './utils/logger.js';

export interface ConvertOptions {
  /** 루트 정의 이름. 없으면 'Message' 또는 마지막 message */
  rootType?: string;
  maxDepth?: number;
  /** 기본: transformed 만 */
  outputs?: { transformed?: boolean; raw?: boolean };
  build?: BuildOptions;
  pipeline?: PipelineConfig;
}

export interface ConvertStats {
  definitions: number;
  rootType: string;
  nodes: number;
  /** 파이프라인 뒤에 남은 노드 수 (transformed 출력이 없으면 0) */
  outputNodes: number;
  unknownFields: number;
  orphans: number;
}

export interface ConvertResult {
  output?: OutputObject;
  raw?: OutputObject;
  stats: ConvertStats;
}

export interface FigFileResult extends ConvertResult {
  fileType: FileType;
  version: number;
  images: Map<string, Uint8Array>;
}

export function convertFig(
  schemaBytes: Uint8Array,
  dataBytes: Uint8Array,
  options: ConvertOptions = {},
): ConvertResult {
  const schema = decodeSchema(schemaBytes);
  const rootTypeId = findRootType(schema, options.rootType);
  const rootType = schema.typeDef(rootTypeId)?.name ?? String(rootTypeId);

  const unknown: UnknownField[] = [];
  const root = decodeValue(schema, dataBytes, rootTypeId, {
    ...(options.maxDepth !== undefined && { maxDepth: options.maxDepth }),
    onUnknownField: field => {
      unknown.push(field);
    },
  });
  if (unknown.length > 0) {
    logger.debug(
      `스키마에 없는 필드 ${unknown.length}개 건너뜀: ` +
        unknown
          .slice(0, 10)
          .map(f => `${f.typeName}#${f.tag}(${f.byteLength}B)`)
          .join(', '),
    );
  }

  const wantTransformed = options.outputs?.transformed ?? true;
  const wantRaw = options.outputs?.raw ?? false;

  const stats: ConvertStats = {
    definitions: schema.size,
    rootType,
    nodes: 0,
    outputNodes: 0,
    unknownFields: unknown.length,
    orphans: 0,
  };
  const result: ConvertResult = { stats };

  if (wantTransformed) {
    const document = buildDocument(root, options.build);
    // 루트 메시지의 부기 필드는 루트 노드의 extras 로
    const rootNode =
      document.extras === null
        ? document.root
        : { ...document.root, extras: { ...document.extras, ...document.root.extras } };
    const transformed = new TransformPipeline(options.pipeline ?? DEFAULT_PIPELINE_CONFIG).run(rootNode);
    stats.nodes = countNodes(document.root);
    stats.outputNodes = countNodes(transformed);
    stats.orphans = document.orphans.length;
    result.output = nodeToOutput(transformed);
  }
  if (wantRaw) {
    result.raw = recordToOutput(root);
  }
  return result;
}

/** 컨테이너(.fig / ZIP) 바이트부터 */
export function convertFigFile(bytes: Uint8Array, options: ConvertOptions = {}): FigFileResult {
  const file = readFigFile(bytes);
  logger.debug(`${file.fileType} v${file.version}: 스키마 ${file.schema.length}B, 데이터 ${file.data.length}B`);
  return {
    ...convertFig(file.schema, file.data, options),
    fileType: file.fileType,
    version: file.version,
    images: file.images,
  };
}
