// apps/web/lib/site-config.ts
import "server-only";
import { loadSiteConfig, type SiteConfig } from "@flatblog/content-store";

let cached: SiteConfig | null = null;

/** 環境変数から読んだ設定（プロセスで1回だけ読む） */
export function getSiteConfig(): SiteConfig {
  if (!cached) cached = loadSiteConfig();
  return cached;
}
