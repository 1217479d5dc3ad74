// packages/content-store/src/posts/postRepository.ts
import * as logger from "firebase-functions/logger";
import type {
  AdminIdentity,
  Post,
  PostFormInput,
  PostStatus,
} from "@flatblog/shared-types";
import { PostFormSchema } from "@flatblog/shared-schemas";
import type { DocumentStore } from "../infra/documentStore";
import { NotFoundError, ValidationError } from "../errors";
import {
  compareByDateDesc,
  nowIso,
  parseDate,
  systemClock,
  type Clock,
} from "../utils/dates";
import { slugify } from "../utils/slug";
import { buildExcerpt, renderMarkdown } from "../utils/markdown";

export type PostRepositoryOptions = {
  /** 新規記事の author（管理者ユーザー） */
  defaultAuthor: string;
  clock?: Clock;
};

/** サイト直下のルートと重なる slug。記事に使うと URL が届かない */
export const RESERVED_SLUGS: readonly string[] = ["about", "admin", "logout"];

export function isReservedSlug(slug: string): boolean {
  return RESERVED_SLUGS.includes(slug);
}

/** 日付の新しい順（読めない日付は最後）。元の配列は変更しない */
export function sortPostsByDate<T extends { date?: string | null }>(
  posts: readonly T[]
): T[] {
  return [...posts].sort(compareByDateDesc);
}

/** max(id) + 1。空なら 1 */
export function nextId(posts: readonly Pick<Post, "id">[]): number {
  if (posts.length === 0) return 1;
  return posts.reduce((max, p) => (p.id > max ? p.id : max), posts[0].id) + 1;
}

/** "a, b,,c " -> ["a", "b", "c"]（順序維持・重複はそのまま） */
export function splitList(raw: string): string[] {
  return (raw ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/** 下書きは管理者にだけ見せる */
export function isVisibleTo(post: Post, viewer: AdminIdentity | null): boolean {
  return post.status === "publish" || viewer !== null;
}

export class PostRepository {
  private readonly defaultAuthor: string;
  private readonly clock: Clock;

  constructor(
    private readonly store: DocumentStore,
    opts: PostRepositoryOptions
  ) {
    this.defaultAuthor = opts.defaultAuthor;
    this.clock = opts.clock ?? systemClock;
  }

  async listPosts(): Promise<Post[]> {
    const doc = await this.store.load();
    return sortPostsByDate(doc.posts);
  }

  async listVisiblePosts(viewer: AdminIdentity | null): Promise<Post[]> {
    const posts = await this.listPosts();
    return posts.filter((p) => isVisibleTo(p, viewer));
  }

  async findBySlug(slug: string): Promise<Post | null> {
    const posts = await this.listPosts();
    return posts.find((p) => p.slug === slug) ?? null;
  }

  async requireBySlug(slug: string): Promise<Post> {
    const post = await this.findBySlug(slug);
    if (!post) throw new NotFoundError("post", slug);
    return post;
  }

  async findVisibleBySlug(
    slug: string,
    viewer: AdminIdentity | null
  ): Promise<Post | null> {
    const post = await this.findBySlug(slug);
    return post && isVisibleTo(post, viewer) ? post : null;
  }

  /**
   * フォーム入力から記事を作成 / 更新して保存する。
   * 入力エラー（タイトル無し・slug 生成不可・予約 slug・slug 重複）は ValidationError で、何も書き込まない
   */
  async savePost(input: PostFormInput, existing?: Post | null): Promise<Post> {
    const form = PostFormSchema.parse(input);

    const title = form.title.trim();
    if (!title) {
      throw new ValidationError("title_required", "Title is required");
    }

    const slug = slugify(form.slug.trim() || existing?.slug || title);
    if (!slug) {
      throw new ValidationError("slug_required", "Slug could not be generated");
    }
    if (isReservedSlug(slug)) {
      throw new ValidationError("slug_reserved", "Slug is reserved");
    }

    const doc = await this.store.load();

    const owner = doc.posts.find(
      (p) => p.slug === slug && (!existing || p.id !== existing.id)
    );
    if (owner) {
      throw new ValidationError("slug_collision", "Slug already exists");
    }

    // 本文: Markdown があれば描画し直す。無ければ HTML 入力 → 既存の HTML
    const markdown = form.content_markdown.trim();
    let html = form.content_html.trim();
    if (markdown) {
      html = renderMarkdown(markdown);
    } else if (!html && existing) {
      html = existing.content_html;
    }

    const now = nowIso(this.clock);
    const dateInput = form.date.trim();
    const date = dateInput && parseDate(dateInput) ? dateInput : now;

    const status: PostStatus = form.status.trim() === "draft" ? "draft" : "publish";

    let excerpt = form.excerpt.trim();
    if (!excerpt && html) excerpt = buildExcerpt(html);

    const post: Post = {
      id: existing ? existing.id : nextId(doc.posts),
      slug,
      title,
      date,
      modified: now,
      status,
      tags: splitList(form.tags),
      categories: splitList(form.categories),
      content_markdown: markdown,
      content_html: html,
      excerpt,
      author: existing?.author || this.defaultAuthor,
    };

    if (existing) {
      const idx = doc.posts.findIndex((p) => p.id === existing.id);
      if (idx === -1) throw new NotFoundError("post", existing.slug);
      doc.posts[idx] = post;
    } else {
      doc.posts.push(post);
    }

    await this.store.save(doc);

    logger.info(`[posts] ${existing ? "updated" : "created"}`, {
      id: post.id,
      slug: post.slug,
      status: post.status,
    });

    return post;
  }
}
