// packages/content-store/src/site/navLinks.ts
import type { NavLink } from "@flatblog/shared-types";
import { defaultNavLinks } from "../infra/defaults";

/**
 * 管理画面のテキストエリア → ナビリンク
 *   label|url|target を1行1件。target 省略時は http で始まれば _blank、それ以外は _self。
 *   ラベルと URL が揃わない行は無視。1件も無ければ既定のリンク
 */
export function parseNavLinks(rawText: string): NavLink[] {
  const links: NavLink[] = [];

  for (const rawLine of (rawText ?? "").split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const parts = line
      .split("|")
      .map((p) => p.trim())
      .filter((p) => p.length > 0);
    if (parts.length < 2) continue;

    const [label, url] = parts;
    const target =
      parts.length > 2 ? parts[2] : url.startsWith("http") ? "_blank" : "_self";
    links.push({ label, url, target });
  }

  return links.length ? links : defaultNavLinks();
}

/** parseNavLinks の逆。フォームの初期値用 */
export function formatNavLinks(links: readonly NavLink[]): string {
  return links
    .map((l) => `${l.label}|${l.url}|${l.target}`)
    .join("\n");
}
