/**
 * figjson.config.yml 로더
 * DESIGN.md "설정 파일" 참고
 *
 * 파일에 없는 항목은 DEFAULT_CONFIG 값을 쓴다.
 * 값은 섹션별 리더로 검증한다. 모르는 키나 타입이 틀린 값은 CONFIG_INVALID.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { ConvertOptions } from './convert.js';
import { DEFAULT_MAX_DEPTH } from './decoder/data-decoder.js';
import type { OutputObject, OutputValue } from './output/types.js';
import {
  DEFAULT_REWRITES,
  DEFAULT_VALUES,
  METADATA_FIELDS,
  PRESERVED_FIELDS,
  REDUNDANT_RULES,
  REWRITE_RULES,
} from './transform/defaults.js';
import type { DefaultEntry, PipelineConfig, RedundantRuleName, RewriteRuleName } from './transform/types.js';
import { DEFAULT_CHILD_FIELDS } from './tree/node-builder.js';
import type { FigJsonError } from './utils/errors.js';

export interface FigJsonConfig {
  output: {
    dir: string;
    pretty: boolean;
    raw: boolean;
    transformed: boolean;
    /** ZIP 컨테이너 안의 images/ 항목을 출력 디렉토리에 쓴다 */
    images: boolean;
  };

  decode: {
    rootType?: string;
    maxDepth: number;
  };

  tree: {
    childFields: readonly string[];
    keepExtras: boolean;
    resolveBlobs: boolean;
  };

  transform: {
    defaults: readonly DefaultEntry[];
    metadataFields: readonly string[];
    preserve: readonly string[];
    redundantRules: readonly RedundantRuleName[];
    rewrites: readonly RewriteRuleName[];
  };
}

// ─── 기본값 ──────────────────────────────────────────────────────────────────

export const DEFAULT_CONFIG: FigJsonConfig = {
  output: {
    dir: './out',
    pretty: true,
    raw: false,
    transformed: true,
    images: true,
  },
  decode: {
    maxDepth: DEFAULT_MAX_DEPTH,
  },
  tree: {
    childFields: DEFAULT_CHILD_FIELDS,
    keepExtras: false,
    resolveBlobs: true,
  },
  transform: {
    defaults: DEFAULT_VALUES,
    metadataFields: METADATA_FIELDS,
    preserve: PRESERVED_FIELDS,
    redundantRules: REDUNDANT_RULES,
    rewrites: DEFAULT_REWRITES,
  },
};

export const CONFIG_FILES = [
  'figjson.config.yml',
  'figjson.config.yaml',
  '.figjson.yml',
];

// ─── ENV 변수 치환 ─────────────────────────────────────────────────────────────

function substituteEnv(value: string): string {
  // ${ENV_VAR} 형식 치환
  return value.replace(/\$\{([^}]+)\}/g, (_match: string, key: string) => {
    const envVal = process.env[key];
    if (envVal === undefined) {
      invalid(`환경변수 ${key}가 설정되지 않았습니다.`);
    }
    return envVal;
  });
}

function substituteEnvDeep(obj: unknown): unknown {
  if (typeof obj === 'string') return substituteEnv(obj);
  if (Array.isArray(obj)) return obj.map(substituteEnvDeep);
  if (isRawSection(obj)) {
    return Object.fromEntries(Object.entries(obj).map(([k, v]) => [k, substituteEnvDeep(v)]));
  }
  return obj;
}

// ─── loadConfig ───────────────────────────────────────────────────────────────

/**
 * 설정 파일 로드
 * @param configPath 명시적 경로 (없으면 cwd 에서 자동 탐색, 못 찾으면 기본값)
 */
export function loadConfig(configPath?: string, cwd: string = process.cwd()): FigJsonConfig {
  const filePath = resolveConfigPath(configPath, cwd);
  if (filePath === null) return DEFAULT_CONFIG;
  return parseConfig(readConfigFile(filePath));
}

/** YAML 텍스트 → 검증된 설정 */
export function parseConfig(content: string): FigJsonConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (e) {
    invalid(e instanceof Error ? e.message : String(e));
  }
  if (parsed === null || parsed === undefined) return DEFAULT_CONFIG;

  const raw = substituteEnvDeep(parsed);
  if (!isRawSection(raw)) invalid('최상위는 객체여야 합니다.');
  checkKeys(raw, '', ['output', 'decode', 'tree', 'transform']);

  const config: FigJsonConfig = {
    output: readOutput(readSection(raw, 'output')),
    decode: readDecode(readSection(raw, 'decode')),
    tree: readTree(readSection(raw, 'tree')),
    transform: readTransform(readSection(raw, 'transform')),
  };
  if (!config.output.raw && !config.output.transformed) {
    invalid('output.raw 와 output.transformed 가 모두 false 입니다.');
  }
  return config;
}

export interface ConfigOverride {
  outDir?: string;
  pretty?: boolean;
  raw?: boolean;
  /** raw 출력만 (transformed 끔) */
  rawOnly?: boolean;
  rootType?: string;
  keepExtras?: boolean;
}

/**
 * CLI 플래그로 설정 일부를 덮어쓴 사본
 */
export function createConfig(override: ConfigOverride, base: FigJsonConfig = DEFAULT_CONFIG): FigJsonConfig {
  return {
    ...base,
    output: {
      ...base.output,
      ...(override.outDir !== undefined && { dir: override.outDir }),
      ...(override.pretty !== undefined && { pretty: override.pretty }),
      ...(override.raw && { raw: true }),
      ...(override.rawOnly && { raw: true, transformed: false }),
    },
    decode: {
      ...base.decode,
      ...(override.rootType !== undefined && { rootType: override.rootType }),
    },
    tree: {
      ...base.tree,
      ...(override.keepExtras !== undefined && { keepExtras: override.keepExtras }),
    },
  };
}

export function toPipelineConfig(config: FigJsonConfig): PipelineConfig {
  return {
    defaults: config.transform.defaults,
    metadataFields: config.transform.metadataFields,
    redundantRules: config.transform.redundantRules,
    rewrites: config.transform.rewrites,
    preserve: config.transform.preserve,
  };
}

export function toConvertOptions(config: FigJsonConfig): ConvertOptions {
  return {
    ...(config.decode.rootType !== undefined && { rootType: config.decode.rootType }),
    maxDepth: config.decode.maxDepth,
    outputs: { transformed: config.output.transformed, raw: config.output.raw },
    build: {
      childFields: config.tree.childFields,
      keepExtras: config.tree.keepExtras,
      resolveBlobs: config.tree.resolveBlobs,
    },
    pipeline: toPipelineConfig(config),
  };
}

// ─── 섹션 리더 ───────────────────────────────────────────────────────────────

function readOutput(section: RawSection): FigJsonConfig['output'] {
  const d = DEFAULT_CONFIG.output;
  checkKeys(section, 'output', ['dir', 'pretty', 'raw', 'transformed', 'images']);
  return {
    dir: readString(section, 'output.dir', 'dir', d.dir),
    pretty: readBoolean(section, 'output.pretty', 'pretty', d.pretty),
    raw: readBoolean(section, 'output.raw', 'raw', d.raw),
    transformed: readBoolean(section, 'output.transformed', 'transformed', d.transformed),
    images: readBoolean(section, 'output.images', 'images', d.images),
  };
}

function readDecode(section: RawSection): FigJsonConfig['decode'] {
  checkKeys(section, 'decode', ['rootType', 'maxDepth']);
  const maxDepth = section['maxDepth'] ?? DEFAULT_CONFIG.decode.maxDepth;
  if (typeof maxDepth !== 'number' || !Number.isInteger(maxDepth) || maxDepth < 1) {
    invalid('decode.maxDepth 는 1 이상의 정수여야 합니다.');
  }
  const rootType = section['rootType'];
  if (rootType === undefined || rootType === null) return { maxDepth };
  if (typeof rootType !== 'string' || rootType === '') invalid('decode.rootType 은 문자열이어야 합니다.');
  return { rootType, maxDepth };
}

function readTree(section: RawSection): FigJsonConfig['tree'] {
  const d = DEFAULT_CONFIG.tree;
  checkKeys(section, 'tree', ['childFields', 'keepExtras', 'resolveBlobs']);
  return {
    childFields: readStringList(section, 'tree.childFields', 'childFields', d.childFields),
    keepExtras: readBoolean(section, 'tree.keepExtras', 'keepExtras', d.keepExtras),
    resolveBlobs: readBoolean(section, 'tree.resolveBlobs', 'resolveBlobs', d.resolveBlobs),
  };
}

/** 목록은 병합하지 않고 통째로 교체한다 */
function readTransform(section: RawSection): FigJsonConfig['transform'] {
  const d = DEFAULT_CONFIG.transform;
  checkKeys(section, 'transform', ['defaults', 'metadataFields', 'preserve', 'redundantRules', 'rewrites']);

  return {
    defaults: readDefaults(section['defaults'], d.defaults),
    metadataFields: readStringList(section, 'transform.metadataFields', 'metadataFields', d.metadataFields),
    preserve: readStringList(section, 'transform.preserve', 'preserve', d.preserve),
    redundantRules: readRuleList(section, 'transform.redundantRules', 'redundantRules', REDUNDANT_RULES, d.redundantRules),
    rewrites: readRuleList(section, 'transform.rewrites', 'rewrites', REWRITE_RULES, d.rewrites),
  };
}

/** 알려진 규칙 이름만 받는다 */
function readRuleList<T extends string>(
  section: RawSection,
  path: string,
  key: string,
  known: readonly T[],
  fallback: readonly T[],
): readonly T[] {
  const value = section[key];
  if (value === undefined || value === null) return fallback;
  if (!Array.isArray(value)) invalid(`${path} 는 배열이어야 합니다.`);
  return value.map((item: unknown) => {
    const rule = known.find(name => name === item);
    if (rule === undefined) {
      invalid(`${path}: 알 수 없는 규칙 "${String(item)}" (${known.join(' | ')})`);
    }
    return rule;
  });
}

function readDefaults(value: unknown, fallback: readonly DefaultEntry[]): readonly DefaultEntry[] {
  if (value === undefined || value === null) return fallback;
  if (!Array.isArray(value)) invalid('transform.defaults 는 배열이어야 합니다.');

  return value.map((item: unknown, i: number): DefaultEntry => {
    const path = `transform.defaults[${i}]`;
    if (!isRawSection(item)) invalid(`${path}: { field, value } 객체여야 합니다.`);
    checkKeys(item, path, ['field', 'value', 'nodeTypes']);
    const field = item['field'];
    if (typeof field !== 'string' || field === '') invalid(`${path}.field 는 문자열이어야 합니다.`);
    if (!('value' in item)) invalid(`${path}.value 가 없습니다.`);

    const entry: DefaultEntry = { field, value: toOutputValue(item['value'], `${path}.value`) };
    if (item['nodeTypes'] === undefined) return entry;
    return { ...entry, nodeTypes: readStringList(item, `${path}.nodeTypes`, 'nodeTypes', []) };
  });
}

// ─── Internal ────────────────────────────────────────────────────────────────

type RawSection = Record<string, unknown>;

function isRawSection(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(reason: string): never {
  const err: FigJsonError = { code: 'CONFIG_INVALID', reason };
  throw err;
}

function checkKeys(section: RawSection, path: string, allowed: readonly string[]): void {
  for (const key of Object.keys(section)) {
    if (!allowed.includes(key)) {
      invalid(`알 수 없는 키 "${path === '' ? key : `${path}.${key}`}"`);
    }
  }
}

function readSection(raw: RawSection, key: string): RawSection {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isRawSection(value)) invalid(`${key} 는 객체여야 합니다.`);
  return value;
}

function readString(section: RawSection, path: string, key: string, fallback: string): string {
  const value = section[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'string') invalid(`${path} 는 문자열이어야 합니다.`);
  return value;
}

function readBoolean(section: RawSection, path: string, key: string, fallback: boolean): boolean {
  const value = section[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'boolean') invalid(`${path} 는 true 또는 false 여야 합니다.`);
  return value;
}

function readStringList(
  section: RawSection,
  path: string,
  key: string,
  fallback: readonly string[],
): readonly string[] {
  const value = section[key];
  if (value === undefined || value === null) return fallback;
  if (!Array.isArray(value)) invalid(`${path} 는 문자열 배열이어야 합니다.`);
  return value.map((item: unknown) => {
    if (typeof item !== 'string') invalid(`${path} 는 문자열 배열이어야 합니다.`);
    return item;
  });
}

/** YAML 값 → JSON 값. 날짜 같은 YAML 전용 타입은 거부 */
function toOutputValue(value: unknown, path: string): OutputValue {
  if (value === null || typeof value === 'boolean' || typeof value === 'string') return value;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) invalid(`${path}: 유한한 숫자가 아닙니다.`);
    return value;
  }
  if (Array.isArray(value)) return value.map((item: unknown, i: number) => toOutputValue(item, `${path}[${i}]`));
  if (isRawSection(value) && Object.getPrototypeOf(value) === Object.prototype) {
    const object: OutputObject = {};
    for (const [k, v] of Object.entries(value)) object[k] = toOutputValue(v, `${path}.${k}`);
    return object;
  }
  invalid(`${path}: JSON 값이 아닙니다.`);
}

function resolveConfigPath(configPath: string | undefined, cwd: string): string | null {
  if (configPath) {
    const abs = resolve(cwd, configPath);
    if (!existsSync(abs)) {
      invalid(`파일을 찾을 수 없음: ${abs}`);
    }
    return abs;
  }

  for (const name of CONFIG_FILES) {
    const abs = resolve(cwd, name);
    if (existsSync(abs)) return abs;
  }
  return null;
}

function readConfigFile(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf-8');
  } catch (e) {
    invalid(e instanceof Error ? e.message : String(e));
  }
}
