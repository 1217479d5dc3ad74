// packages/content-store/src/config.ts
import path from "node:path";
import { z } from "zod";

const EnvSchema = z.object({
  FLATBLOG_DATA_PATH: z.string().trim().min(1).optional(),
  SITE_TITLE: z.string().trim().min(1).default("flatblog"),
  SITE_DESCRIPTION: z.string().trim().min(1).default("A small flat-file blog"),
  ADMIN_USER: z.string().trim().min(1).default("admin@example.com"),
  ADMIN_PASSWORD: z.string().min(1).default("change-me"),
  SESSION_SECRET: z.string().min(1).default("dev-secret-change-me"),
});

export type SiteConfig = {
  /** posts.json の絶対パス */
  dataPath: string;
  siteTitle: string;
  siteDescription: string;
  adminUser: string;
  adminPassword: string;
  sessionSecret: string;
};

type Env = Record<string, string | undefined>;

/**
 * 環境変数から設定を組み立てる。空文字は未設定と同じ扱い。
 * 相対パスの FLATBLOG_DATA_PATH は cwd 基準で解決する
 */
export function loadSiteConfig(
  env: Env = process.env,
  cwd: string = process.cwd()
): SiteConfig {
  const cleaned: Env = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const v = env[key];
    if (v !== undefined && v.trim() !== "") cleaned[key] = v;
  }

  const parsed = EnvSchema.parse(cleaned);

  return {
    dataPath: path.resolve(
      cwd,
      parsed.FLATBLOG_DATA_PATH ?? path.join("data", "posts.json")
    ),
    siteTitle: parsed.SITE_TITLE,
    siteDescription: parsed.SITE_DESCRIPTION,
    adminUser: parsed.ADMIN_USER,
    adminPassword: parsed.ADMIN_PASSWORD,
    sessionSecret: parsed.SESSION_SECRET,
  };
}
