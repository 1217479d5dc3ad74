// packages/shared-types/src/index.ts

export type PostStatus = "publish" | "draft";

/** ブログ記事。フィールド名はディスク上の JSON と同じ snake_case */
export interface Post {
  id: number;
  slug: string;
  title: string;
  date: string; // YYYY-MM-DDTHH:MM:SS (UTC)。空や不正値のまま残ることもある
  modified: string;
  status: PostStatus;
  tags: string[];
  categories: string[];
  content_markdown: string;
  content_html: string;
  excerpt: string;
  author: string;
}

/** 時系列に並ばない固定ページ（About など） */
export interface Page {
  title: string;
  slug: string;
  content_html: string;
  content_markdown: string;
  updated: string;
}

export interface NavLink {
  label: string;
  url: string;
  target: string; // "_self" | "_blank" が普通だが、入力された値をそのまま持つ
}

export interface SiteSettings {
  nav_links: NavLink[];
  main_title: string;
}

/** 永続化の単位。posts.json 1ファイルがこれ1つ */
export interface BlogDocument {
  posts: Post[];
  pages: Record<string, Page>;
  settings: SiteSettings;
}

/** 管理画面の記事フォーム（リクエストから取り出した生の値） */
export interface PostFormInput {
  title?: string;
  slug?: string;
  content_markdown?: string;
  content_html?: string;
  date?: string;
  tags?: string;
  categories?: string;
  status?: string;
  excerpt?: string;
}

export interface SettingsFormInput {
  nav_links?: string;
  main_title?: string;
}

/** 設定画面の入力。About の本文も同じ保存でまとめて書く */
export interface AdminSettingsInput extends SettingsFormInput {
  about_content?: string;
}

export interface PageFormInput {
  title?: string;
  content_html?: string;
  content_markdown?: string;
}

/** ログイン済み管理者。未ログインは null で表す */
export interface AdminIdentity {
  user: string;
}
