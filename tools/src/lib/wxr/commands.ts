// tools/src/lib/wxr/commands.ts
import {
  DocumentStore,
  StorageError,
  systemClock,
  type Clock,
} from "@flatblog/content-store";
import { buildImportDocument, mergeExport, readExport } from "./parseExport";

export type CommandOptions = {
  /** 取り込み先 posts.json */
  dataPath: string;
  clock?: Clock;
};

export type ImportSummary = {
  posts: number;
  pages: number;
  dataPath: string;
};

export type MergeSummary = ImportSummary & {
  addedPages: string[];
  navLinks: number;
};

/**
 * エクスポートから posts.json を作り直す（既存ファイルは上書き）。
 * 初回投入用
 */
export async function importWordPress(
  xmlPath: string,
  opts: CommandOptions
): Promise<ImportSummary> {
  const parsed = await readExport(xmlPath, opts.clock ?? systemClock);
  const doc = buildImportDocument(parsed);

  const store = new DocumentStore({ path: opts.dataPath, defaultMainTitle: "" });
  await store.save(doc);

  return {
    posts: doc.posts.length,
    pages: Object.keys(doc.pages).length,
    dataPath: store.path,
  };
}

/**
 * 既存の posts.json に、エクスポートにあって手元に無いページだけを足す。
 * 足りない settings も既定値で埋めて書き戻す。記事は変えない
 */
export async function mergeFromExport(
  xmlPath: string,
  opts: CommandOptions
): Promise<MergeSummary> {
  const parsed = await readExport(xmlPath, opts.clock ?? systemClock);

  // main_title が無いファイルには空文字を入れる
  const store = new DocumentStore({ path: opts.dataPath, defaultMainTitle: "" });
  if (!(await store.exists())) {
    throw new StorageError(`Data file not found: ${store.path}`, store.path);
  }

  const { document, addedPages } = mergeExport(await store.load(), parsed);
  await store.save(document);

  return {
    posts: document.posts.length,
    pages: Object.keys(document.pages).length,
    navLinks: document.settings.nav_links.length,
    addedPages,
    dataPath: store.path,
  };
}
