/**
 * fig-json 에러 타입 정의 및 유틸리티
 * DESIGN.md "에러 처리" 참고
 *
 * 모든 에러는 `code` 판별자를 가진 객체로 throw 된다.
 * 디코드 계열 에러는 오프셋 / 태그 / 타입 이름으로 문제 레코드를 특정할 수 있어야 한다.
 */

// ─── 디코드 에러 ────────────────────────────────────────────────────────────

export type DecodeError =
  | { code: 'MALFORMED_SCHEMA';  reason: string; offset?: number; definition?: string }
  | { code: 'TRUNCATED_STREAM';  offset: number; needed: number; available: number; tag?: number; typeName?: string }
  | { code: 'UNKNOWN_TAG';       offset: number; tag: number; wireKind: number; typeName: string }
  | { code: 'TYPE_MISMATCH';     offset: number; reason: string; tag?: number; typeName?: string }
  | { code: 'UNKNOWN_ROOT_TYPE'; root: string | number; available: number };

// ─── 컨테이너 에러 ──────────────────────────────────────────────────────────

export type ContainerError =
  | { code: 'INVALID_HEADER';       header: string }
  | { code: 'FILE_TOO_SMALL';       expected: number; actual: number }
  | { code: 'INCOMPLETE_CHUNK';     offset: number; expected: number; actual: number }
  | { code: 'NOT_ENOUGH_CHUNKS';    expected: number; actual: number }
  | { code: 'CANVAS_NOT_FOUND';     entries: string[] }
  | { code: 'DECOMPRESSION_FAILED'; reason: string };

export type FigJsonError =
  | DecodeError
  | ContainerError
  | { code: 'TREE_INVALID';      reason: string }
  | { code: 'CONFIG_INVALID';    reason: string }
  | { code: 'FILE_WRITE_FAILED'; path: string; reason: string };

// 빠진 코드가 있으면 컴파일 에러
const CODE_TABLE: Record<FigJsonError['code'], true> = {
  MALFORMED_SCHEMA: true,
  TRUNCATED_STREAM: true,
  UNKNOWN_TAG: true,
  TYPE_MISMATCH: true,
  UNKNOWN_ROOT_TYPE: true,
  INVALID_HEADER: true,
  FILE_TOO_SMALL: true,
  INCOMPLETE_CHUNK: true,
  NOT_ENOUGH_CHUNKS: true,
  CANVAS_NOT_FOUND: true,
  DECOMPRESSION_FAILED: true,
  TREE_INVALID: true,
  CONFIG_INVALID: true,
  FILE_WRITE_FAILED: true,
};

const FIG_JSON_CODES: ReadonlySet<string> = new Set(Object.keys(CODE_TABLE));

const DECODE_CODES: ReadonlySet<string> = new Set([
  'MALFORMED_SCHEMA',
  'TRUNCATED_STREAM',
  'UNKNOWN_TAG',
  'TYPE_MISMATCH',
  'UNKNOWN_ROOT_TYPE',
]);

/** FigJsonError인지 타입 가드. Node 시스템 에러(ENOENT 등)의 code 는 통과하지 않는다 */
export function isFigJsonError(err: unknown): err is FigJsonError {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    typeof err.code === 'string' &&
    FIG_JSON_CODES.has(err.code)
  );
}

/** 디코드 계열 에러만 */
export function isDecodeError(err: unknown): err is DecodeError {
  return isFigJsonError(err) && DECODE_CODES.has(err.code);
}

/**
 * 필드 단위 디코드 중 올라온 에러에 태그 / 타입 이름이 비어 있으면 채워 넣는다.
 * 이미 더 안쪽 레코드의 컨텍스트가 들어 있으면 그대로 둔다.
 */
export function withDecodeContext(err: unknown, tag: number | undefined, typeName: string): unknown {
  if (!isDecodeError(err)) return err;
  if (err.code === 'TRUNCATED_STREAM' || err.code === 'TYPE_MISMATCH') {
    if (err.typeName !== undefined) return err;
    return tag === undefined ? { ...err, typeName } : { ...err, tag, typeName };
  }
  return err;
}

function locate(err: { offset?: number; tag?: number; typeName?: string }): string {
  const parts: string[] = [];
  if (err.typeName !== undefined) parts.push(err.typeName);
  if (err.tag !== undefined) parts.push(`tag ${err.tag}`);
  if (err.offset !== undefined) parts.push(`offset ${err.offset}`);
  return parts.length > 0 ? ` [${parts.join(', ')}]` : '';
}

/** FigJsonError를 사람이 읽을 수 있는 메시지로 변환 */
export function formatFigJsonError(err: FigJsonError): string {
  switch (err.code) {
    case 'MALFORMED_SCHEMA': {
      const where = err.definition !== undefined ? ` (${err.definition})` : '';
      const at = err.offset !== undefined ? ` @${err.offset}` : '';
      return `스키마 형식 오류${where}${at}: ${err.reason}`;
    }
    case 'TRUNCATED_STREAM':
      return `스트림이 잘림: ${err.needed}바이트 필요, ${err.available}바이트 남음${locate(err)}`;
    case 'UNKNOWN_TAG':
      return `건너뛸 수 없는 미지 태그 ${err.tag} (wire kind ${err.wireKind})${locate(err)}`;
    case 'TYPE_MISMATCH':
      return `타입 불일치: ${err.reason}${locate(err)}`;
    case 'UNKNOWN_ROOT_TYPE':
      return `루트 타입을 찾을 수 없음: ${String(err.root)} (정의 ${err.available}개)`;
    case 'INVALID_HEADER':
      return `잘못된 매직 헤더: "${err.header}" ('fig-kiwi' 또는 'fig-jam.' 필요)`;
    case 'FILE_TOO_SMALL':
      return `파일이 너무 작음: 최소 ${err.expected}바이트 필요, ${err.actual}바이트`;
    case 'INCOMPLETE_CHUNK':
      return `불완전한 청크 @${err.offset}: ${err.expected}바이트 선언, ${err.actual}바이트 남음`;
    case 'NOT_ENOUGH_CHUNKS':
      return `청크 부족: 최소 ${err.expected}개 필요, ${err.actual}개`;
    case 'CANVAS_NOT_FOUND':
      return `ZIP 안에 canvas.fig 없음. 내용: [${err.entries.join(', ')}]`;
    case 'DECOMPRESSION_FAILED':
      return `청크 압축 해제 실패: ${err.reason}`;
    case 'TREE_INVALID':
      return `노드 트리 구성 실패: ${err.reason}`;
    case 'CONFIG_INVALID':
      return `설정 파일 오류: ${err.reason}`;
    case 'FILE_WRITE_FAILED':
      return `파일 쓰기 실패 [${err.path}]: ${err.reason}`;
  }
}

/** catch 블록에서 받은 값을 메시지로 */
export function describeError(err: unknown): string {
  if (isFigJsonError(err)) return formatFigJsonError(err);
  return err instanceof Error ? err.message : String(err);
}
