/**
 * trait 문장 → 목록.
 * 점(.)으로 나누고 공백을 제거하며 빈 조각은 버린다. 순서와 중복은 유지된다.
 *
 * @example
 * splitTraits('Item. Weapon.'); // ['Item', 'Weapon']
 */
export function splitTraits(traits: string): string[] {
  return traits
    .split('.')
    .map((t) => t.trim())
    .filter((t) => t.length > 0);
}

/**
 * trait 목록 → 문장. `splitTraits`의 역방향.
 *
 * @example
 * mergeTraits(['Item', 'Weapon']); // 'Item. Weapon.'
 * mergeTraits([]); // ''
 */
export function mergeTraits(traits: readonly string[]): string {
  if (traits.length === 0) return '';
  return `${traits.join('. ')}.`;
}
