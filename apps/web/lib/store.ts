// apps/web/lib/store.ts
import "server-only";
import { createContentStore, type ContentStore } from "@flatblog/content-store";
import { getSiteConfig } from "./site-config";

let store: ContentStore | null = null;

/** posts.json へのリポジトリ一式（プロセスで1つ） */
export function getContentStore(): ContentStore {
  if (!store) store = createContentStore(getSiteConfig());
  return store;
}

export const getPosts = () => getContentStore().posts;
export const getSite = () => getContentStore().site;
