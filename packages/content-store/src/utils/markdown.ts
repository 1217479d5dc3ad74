// packages/content-store/src/utils/markdown.ts
import { unified } from "unified";
import remarkParse from "remark-parse";
import remarkGfm from "remark-gfm";
import remarkRehype from "remark-rehype";
import rehypeSlug from "rehype-slug";
import rehypeExternalLinks from "rehype-external-links";
import rehypeStringify from "rehype-stringify";
import rehypeParse from "rehype-parse";
import { toText } from "hast-util-to-text";

export const EXCERPT_LENGTH = 220;

// 本文の生 HTML はそのまま通す（管理者しか書かない前提）
const processor = unified()
  .use(remarkParse)
  .use(remarkGfm)
  .use(remarkRehype, { allowDangerousHtml: true })
  .use(rehypeSlug)
  .use(rehypeExternalLinks, {
    target: "_blank",
    rel: ["nofollow", "noopener", "noreferrer"],
  })
  .use(rehypeStringify, { allowDangerousHtml: true });

const htmlParser = unified().use(rehypeParse, { fragment: true });

/**
 * Markdown → HTML
 * - GFM（表・フェンスコード・タスクリスト・打ち消し線）
 * - 見出しに id を付与
 * - 外部リンクは別タブ
 */
export function renderMarkdown(md: string): string {
  const src = md ?? "";
  if (!src.trim()) return "";
  return String(processor.processSync(src));
}

/** HTML の表示テキスト。実体参照は戻し、空白・改行は 1 つの空白にまとめる */
export function htmlToText(html: string): string {
  const tree = htmlParser.parse(html ?? "");
  return toText(tree).replace(/\s+/g, " ").trim();
}

/**
 * 一覧用の抜粋。length 文字（コードポイント単位）を超えたら切って "…" を付ける
 */
export function buildExcerpt(html: string, length = EXCERPT_LENGTH): string {
  const text = htmlToText(html);
  const chars = Array.from(text);
  if (chars.length <= length) return text;
  return `${chars.slice(0, length).join("").trimEnd()}…`;
}
