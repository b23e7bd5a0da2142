/**
 * 스키마 모델
 *
 * 정의 테이블은 TypeId(= 배열 인덱스)로 주소 지정되는 평평한 배열이다.
 * 필드는 다른 정의를 포인터가 아닌 인덱스로 참조하므로 자기 참조 / 상호 재귀가 자유롭다.
 * 참조 해석은 디코드 시점에 지연 수행된다.
 */

export type TypeId = number;

export type ScalarKind =
  | 'bool'
  | 'byte'
  | 'int'
  | 'uint'
  | 'float'
  | 'double'
  | 'string'
  | 'bytes'
  | 'int64'
  | 'uint64';

export type DefinitionKind = 'enum' | 'struct' | 'message';

export type FieldModifier = 'none' | 'array' | 'optional';

export type TypeRef =
  | { kind: 'scalar'; scalar: ScalarKind }
  | { kind: 'ref'; typeId: TypeId };

export interface FieldDef {
  readonly name: string;
  /** 스키마 버전 간 안정적인 필드 식별자. enum이면 멤버 값 */
  readonly tag: number;
  readonly type: TypeRef;
  readonly modifier: FieldModifier;
}

export interface TypeDef {
  readonly id: TypeId;
  readonly name: string;
  readonly kind: DefinitionKind;
  readonly fields: readonly FieldDef[];
}

// ─── 스칼라 코드 ─────────────────────────────────────────────────────────────
// 바이너리 스키마에서 Field.type 이 음수이면 스칼라, 0 이상이면 TypeId

export const SCALAR_CODES: Readonly<Record<ScalarKind, number>> = {
  bool: -1,
  byte: -2,
  int: -3,
  uint: -4,
  float: -5,
  string: -6,
  int64: -7,
  uint64: -8,
  double: -9,
  bytes: -10,
};

export const SCALAR_KINDS: readonly ScalarKind[] = [
  'bool', 'byte', 'int', 'uint', 'float', 'string', 'int64', 'uint64', 'double', 'bytes',
];

const SCALAR_BY_CODE = new Map<number, ScalarKind>(
  SCALAR_KINDS.map(kind => [SCALAR_CODES[kind], kind]),
);

export function scalarFromCode(code: number): ScalarKind | undefined {
  return SCALAR_BY_CODE.get(code);
}

export function isScalarKind(name: string): name is ScalarKind {
  return SCALAR_KINDS.some(kind => kind === name);
}

export function typeRefCode(ref: TypeRef): number {
  return ref.kind === 'scalar' ? SCALAR_CODES[ref.scalar] : ref.typeId;
}

// ─── Schema ─────────────────────────────────────────────────────────────────

/**
 * 불변 스키마 테이블 + 조회 인덱스
 * 파일 하나의 변환 동안 읽기 전용으로 공유된다
 */
export class Schema {
  private readonly byName = new Map<string, TypeDef>();
  private readonly tagIndex: ReadonlyArray<ReadonlyMap<number, FieldDef>>;
  private readonly nameIndex: ReadonlyArray<ReadonlyMap<string, FieldDef>>;

  constructor(readonly definitions: readonly TypeDef[]) {
    for (const def of definitions) {
      if (!this.byName.has(def.name)) this.byName.set(def.name, def);
    }
    this.tagIndex = definitions.map(def => new Map<number, FieldDef>(def.fields.map(f => [f.tag, f])));
    this.nameIndex = definitions.map(def => new Map<string, FieldDef>(def.fields.map(f => [f.name, f])));
  }

  get size(): number {
    return this.definitions.length;
  }

  typeDef(id: TypeId): TypeDef | undefined {
    return this.definitions[id];
  }

  typeByName(name: string): TypeDef | undefined {
    return this.byName.get(name);
  }

  fieldByTag(def: TypeDef, tag: number): FieldDef | undefined {
    return this.tagIndex[def.id]?.get(tag);
  }

  fieldByName(def: TypeDef, name: string): FieldDef | undefined {
    return this.nameIndex[def.id]?.get(name);
  }

  /** enum 멤버 (값 기준). 범위 밖이면 undefined */
  enumMember(def: TypeDef, value: number): FieldDef | undefined {
    return def.kind === 'enum' ? this.fieldByTag(def, value) : undefined;
  }

  /** 타입 참조를 사람이 읽을 수 있는 형태로 (inspect 출력용) */
  describeType(ref: TypeRef, modifier: FieldModifier = 'none'): string {
    const base =
      ref.kind === 'scalar' ? ref.scalar : (this.typeDef(ref.typeId)?.name ?? `#${ref.typeId}`);
    if (modifier === 'array') return `${base}[]`;
    if (modifier === 'optional') return `${base}?`;
    return base;
  }
}
