// tools/src/lib/wxr/parseExport.ts
import { readFile } from "node:fs/promises";
import * as cheerio from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import * as logger from "firebase-functions/logger";
import type { BlogDocument, Page, Post } from "@flatblog/shared-types";
import {
  ImportError,
  RESERVED_SLUGS,
  defaultNavLinks,
  formatIso,
  nowIso,
  parseDate,
  slugify,
  sortPostsByDate,
  systemClock,
  titleFromSlug,
  withUniqueIds,
  type Clock,
} from "@flatblog/content-store";

export type ParsedExport = {
  posts: Post[];
  pages: Record<string, Page>;
};

export type MergeResult = {
  document: BlogDocument;
  addedPages: string[];
};

/**
 * WordPress の日付 → YYYY-MM-DDTHH:MM:SS（UTC）
 *   "2024-01-02 03:04:05" / "+0900" 付き / 一般的な ISO を受ける。
 *   オフセット付きは UTC に直す。空・読めない値（"0000-00-00 00:00:00" など）は現在時刻
 */
export function toIsoDate(raw: string, clock: Clock = systemClock): string {
  const d = parseDate(raw);
  return d ? formatIso(d) : nowIso(clock);
}

// 名前空間付き要素（wp:post_name など）の直下テキスト
function childText($item: Cheerio<Element>, tag: string): string {
  return $item.children(tag.replace(":", "\\:")).first().text();
}

function readPost(
  $: CheerioAPI,
  $item: Cheerio<Element>,
  clock: Clock
): Post {
  const title = childText($item, "title").trim();
  const postId = Number.parseInt(childText($item, "wp:post_id").trim(), 10);
  const rawStatus = childText($item, "wp:status").trim();
  const date = toIsoDate(childText($item, "wp:post_date"), clock);

  const tags: string[] = [];
  const categories: string[] = [];
  $item.children("category").each((_, el) => {
    const $cat = $(el);
    const label = $cat.text().trim();
    if (!label) return;

    const domain = $cat.attr("domain") ?? "";
    if (domain === "post_tag") tags.push(label);
    else if (domain === "category") categories.push(label);
  });

  return {
    // 0 は後で振り直す
    id: Number.isNaN(postId) ? 0 : postId,
    slug: childText($item, "wp:post_name").trim() || slugify(title),
    title,
    date,
    modified: date,
    // private / pending / future などは下書きとして取り込む
    status: rawStatus === "" || rawStatus === "publish" ? "publish" : "draft",
    tags,
    categories,
    content_markdown: "",
    content_html: childText($item, "content:encoded"),
    excerpt: childText($item, "excerpt:encoded"),
    author: childText($item, "dc:creator").trim(),
  };
}

/**
 * 記事の slug を一意にする（item 順）。重なったら -2, -3 … を付ける。
 * サイトのルート（about など）も使用済みとして扱う。slug が作れない記事は post-<id>
 */
function dedupeSlugs(posts: Post[]): Post[] {
  const taken = new Set<string>(RESERVED_SLUGS);

  return posts.map((post) => {
    const base = post.slug || `post-${post.id}`;
    let slug = base;
    for (let n = 2; taken.has(slug); n++) slug = `${base}-${n}`;
    taken.add(slug);

    if (slug === post.slug) return post;
    logger.warn("[wxr] renamed post slug", { id: post.id, from: post.slug, to: slug });
    return { ...post, slug };
  });
}

/**
 * WXR（WordPress のエクスポート XML）を記事とページに分ける。
 * post_type が post / page 以外（添付ファイル・メニュー項目など）は捨てる
 */
export function parseExport(xml: string, clock: Clock = systemClock): ParsedExport {
  const $ = cheerio.load(xml, { xml: true });

  const $channel = $("rss > channel").first();
  if ($channel.length === 0) {
    throw new ImportError("Not a WordPress export: <rss><channel> is missing");
  }

  const posts: Post[] = [];
  const pages: Record<string, Page> = {};
  let skipped = 0;

  $channel.children("item").each((_, el) => {
    const $item = $(el);
    const postType = childText($item, "wp:post_type").trim();

    if (postType === "post") {
      posts.push(readPost($, $item, clock));
      return;
    }

    if (postType === "page") {
      const slug = childText($item, "wp:post_name").trim();
      // slug の無いページは後から参照できないので取り込まない
      if (!slug) {
        skipped++;
        return;
      }
      pages[slug] = {
        title: childText($item, "title").trim() || titleFromSlug(slug),
        slug,
        content_html: childText($item, "content:encoded"),
        content_markdown: "",
        updated: nowIso(clock),
      };
      return;
    }

    skipped++;
  });

  logger.info("[wxr] parsed export", {
    posts: posts.length,
    pages: Object.keys(pages).length,
    skipped,
  });

  return { posts: sortPostsByDate(dedupeSlugs(withUniqueIds(posts))), pages };
}

/** 初回投入用の新しいドキュメント（既定のナビ・main_title は空） */
export function buildImportDocument(parsed: ParsedExport): BlogDocument {
  return {
    posts: parsed.posts,
    pages: parsed.pages,
    settings: {
      nav_links: defaultNavLinks(),
      main_title: "",
    },
  };
}

/**
 * 既存ドキュメントに、まだ無いページだけを足す。記事と既存ページには触らない
 */
export function mergeExport(
  document: BlogDocument,
  parsed: ParsedExport
): MergeResult {
  const addedPages = Object.keys(parsed.pages).filter(
    (slug) => !(slug in document.pages)
  );

  const pages = { ...document.pages };
  for (const slug of addedPages) pages[slug] = parsed.pages[slug];

  return {
    document: { ...document, pages },
    addedPages,
  };
}

/** エクスポートファイルを読んでパースする。無ければ ImportError */
export async function readExport(
  xmlPath: string,
  clock: Clock = systemClock
): Promise<ParsedExport> {
  let xml: string;
  try {
    xml = await readFile(xmlPath, "utf8");
  } catch (e) {
    throw new ImportError(`File not found: ${xmlPath}`, xmlPath, e);
  }

  try {
    return parseExport(xml, clock);
  } catch (e) {
    if (e instanceof ImportError) {
      throw new ImportError(`${e.message} (${xmlPath})`, xmlPath, e);
    }
    throw e;
  }
}
