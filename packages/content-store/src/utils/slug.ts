// packages/content-store/src/utils/slug.ts
// 外部依存なしユーティリティ

// 分解しても ASCII にならない文字の置き換え
const EXTRA: Record<string, string> = {
  ß: "ss",
  æ: "ae",
  œ: "oe",
  ø: "o",
  đ: "d",
  ð: "d",
  þ: "th",
  ł: "l",
  ı: "i",
  "&": " and ",
};

/**
 * タイトルや入力値を URL 用の slug にする。
 * 例: slugify("Café & Crème Brûlée!") -> "cafe-and-creme-brulee"
 */
export function slugify(input: string): string {
  return (input ?? "")
    .toLowerCase()
    .replace(/[ßæœøđðþłı&]/g, (c) => EXTRA[c] ?? c)
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/['’]/g, "")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/-+/g, "-")
    .replace(/(^-|-$)/g, "");
}

/** "about-me" -> "About-Me"（import 時のページタイトル補完用） */
export function titleFromSlug(slug: string): string {
  return slug
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_m, sep: string, ch: string) =>
      `${sep}${ch.toUpperCase()}`
    );
}
