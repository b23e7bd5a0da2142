/**
 * 출력 트리 값
 * JSON 으로 그대로 직렬화 가능한 값만 허용한다 (bigint / Uint8Array / Map 없음)
 */

export type OutputValue = null | boolean | number | string | OutputValue[] | OutputObject;

export interface OutputObject {
  [key: string]: OutputValue;
}

export function isOutputObject(value: OutputValue | undefined): value is OutputObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** 엄격한 구조 비교. 숫자는 === 로만 같다 */
export function outputEquals(a: OutputValue, b: OutputValue): boolean {
  if (a === b) return true;
  if (Array.isArray(a)) {
    return Array.isArray(b) && a.length === b.length && a.every((item, i) => {
      const other = b[i];
      return other !== undefined && outputEquals(item, other);
    });
  }
  if (isOutputObject(a) && isOutputObject(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every(key => {
      const left = a[key];
      const right = b[key];
      return left !== undefined && right !== undefined && outputEquals(left, right);
    });
  }
  return false;
}
