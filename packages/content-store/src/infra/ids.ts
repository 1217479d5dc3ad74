// packages/content-store/src/infra/ids.ts

/**
 * 無い・0 以下・重複した id に max(id) + 1 から順に振り直す（配列順）。
 * 正しい id はそのまま。同じ入力なら毎回同じ結果になる
 */
export function withUniqueIds<T extends { id?: number }>(
  items: readonly T[]
): Array<T & { id: number }> {
  let max = items.reduce(
    (m, item) => (item.id !== undefined && item.id > m ? item.id : m),
    0
  );
  const seen = new Set<number>();

  return items.map((item) => {
    let id = item.id;
    if (id === undefined || id <= 0 || seen.has(id)) {
      max += 1;
      id = max;
    }
    seen.add(id);
    return { ...item, id };
  });
}
