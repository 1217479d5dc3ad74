// packages/content-store/src/index.ts
import type { SiteConfig } from "./config";
import { DocumentStore } from "./infra/documentStore";
import { PostRepository } from "./posts/postRepository";
import { SiteRepository } from "./site/siteRepository";
import type { Clock } from "./utils/dates";

export * from "./config";
export * from "./errors";
export * from "./utils/dates";
export * from "./utils/slug";
export * from "./utils/markdown";
export * from "./infra/defaults";
export * from "./infra/documentStore";
export * from "./infra/ids";
export * from "./posts/postRepository";
export * from "./site/navLinks";
export * from "./site/siteRepository";

export type ContentStore = {
  store: DocumentStore;
  posts: PostRepository;
  site: SiteRepository;
};

/** 設定から DocumentStore と各リポジトリをまとめて作る */
export function createContentStore(
  config: Pick<SiteConfig, "dataPath" | "siteDescription" | "adminUser">,
  clock?: Clock
): ContentStore {
  const store = new DocumentStore({
    path: config.dataPath,
    defaultMainTitle: config.siteDescription,
  });

  return {
    store,
    posts: new PostRepository(store, {
      defaultAuthor: config.adminUser,
      clock,
    }),
    site: new SiteRepository(store, {
      defaultMainTitle: config.siteDescription,
      clock,
    }),
  };
}
