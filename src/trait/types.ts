/**
 * 팩 JSON 파일의 카드 한 장.
 * `code`와 `traits` 외의 필드는 해석하지 않고 원래 순서 그대로 보존된다.
 */
export interface CardRecord {
  /** 카드 고유 코드 (e.g. `'01001'`). */
  code: string;
  /** 점으로 구분된 trait 문장 (e.g. `'Item. Weapon.'`). */
  traits?: string;
  [field: string]: unknown;
}

/**
 * traits 사전 항목.
 * 마스터 파일에서는 `name === code`, 언어별 파일에서는 `name`이 번역된 이름이다.
 */
export interface TraitEntry {
  /** 영문 trait 이름. 파일 내 유일 키. */
  code: string;
  /** 표시 이름. */
  name: string;
}

export function isCardRecord(value: unknown): value is CardRecord {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  if (!('code' in value) || typeof value.code !== 'string') return false;
  return !('traits' in value) || value.traits === undefined || typeof value.traits === 'string';
}

export function isTraitEntry(value: unknown): value is TraitEntry {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  return (
    'code' in value &&
    typeof value.code === 'string' &&
    'name' in value &&
    typeof value.name === 'string'
  );
}

/**
 * code 오름차순, 같으면 name 오름차순 비교 (UTF-16 코드 단위 순서).
 */
export function compareTraitEntries(a: TraitEntry, b: TraitEntry): number {
  if (a.code !== b.code) return a.code < b.code ? -1 : 1;
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  return 0;
}
