// packages/shared-schemas/src/index.ts
import { z } from "zod";

// ---- posts ----
export const PostStatusSchema = z.enum(["publish", "draft"]);
type PostStatusParsed = z.infer<typeof PostStatusSchema>;

// 未指定は公開扱い。WordPress 由来の private / pending などは下書きに寄せる
const storedStatus = z
  .string()
  .optional()
  .transform(
    (s): PostStatusParsed =>
      s === undefined || s === "publish" ? "publish" : "draft"
  );

/**
 * ディスク上の記事。古いデータや import 直後のデータにも耐えるよう全部補完する。
 * id だけは一意に振り直す必要があるので、ここでは埋めずに DocumentStore に任せる
 */
export const PostRecordSchema = z.object({
  id: z.number().int().optional(),
  slug: z.string().default(""),
  title: z.string().default(""),
  date: z.string().default(""),
  modified: z.string().default(""),
  status: storedStatus,
  tags: z.array(z.string()).default([]),
  categories: z.array(z.string()).default([]),
  content_markdown: z.string().default(""),
  content_html: z.string().default(""),
  excerpt: z.string().default(""),
  author: z.string().default(""),
});

export type PostRecord = z.infer<typeof PostRecordSchema>;

// ---- pages ----
export const PageRecordSchema = z.object({
  title: z.string().default(""),
  slug: z.string().default(""),
  content_html: z.string().default(""),
  content_markdown: z.string().default(""),
  updated: z.string().default(""),
});

// ---- settings ----
export const NavLinkSchema = z.object({
  label: z.string(),
  url: z.string().default(""),
  target: z.string().default("_self"),
});

/**
 * settings の既定値（nav_links / main_title）は設定値に依存するので、
 * ここでは optional にしておき DocumentStore 側で埋める
 */
export const SettingsRecordSchema = z.object({
  nav_links: z.array(NavLinkSchema).optional(),
  main_title: z.string().optional(),
});

// ---- document ----
const DocumentObjectSchema = z.object({
  posts: z.array(PostRecordSchema).default([]),
  pages: z.record(z.string(), PageRecordSchema).default({}),
  settings: SettingsRecordSchema.default({}),
});

/** 旧形式（記事配列だけのファイル）も { posts } として受ける */
export const StoredDocumentSchema = z.union([
  DocumentObjectSchema,
  z.array(PostRecordSchema).transform(
    (posts): z.infer<typeof DocumentObjectSchema> => ({
      posts,
      pages: {},
      settings: {},
    })
  ),
]);

export type StoredDocument = z.infer<typeof StoredDocumentSchema>;

// ---- admin forms ----
const field = z.string().default("");

export const PostFormSchema = z.object({
  title: field,
  slug: field,
  content_markdown: field,
  content_html: field,
  date: field,
  tags: field,
  categories: field,
  status: field,
  excerpt: field,
});

export type PostFormParsed = z.infer<typeof PostFormSchema>;

export const SettingsFormSchema = z.object({
  about_content: field,
  nav_links: field,
  main_title: field,
});

export const LoginFormSchema = z.object({
  username: field,
  password: field,
  next: field,
});

/** FormData を「文字列だけのレコード」にする（File は捨てる） */
export function formDataToRecord(form: FormData): Record<string, string> {
  const out: Record<string, string> = {};
  form.forEach((value, key) => {
    if (typeof value === "string") out[key] = value;
  });
  return out;
}
