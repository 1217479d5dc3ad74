// packages/content-store/src/infra/documentStore.ts
import { access, mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { randomBytes } from "node:crypto";
import * as logger from "firebase-functions/logger";
import type { BlogDocument } from "@flatblog/shared-types";
import {
  StoredDocumentSchema,
  type StoredDocument,
} from "@flatblog/shared-schemas";
import { StorageError } from "../errors";
import { defaultNavLinks, emptyDocument } from "./defaults";
import { withUniqueIds } from "./ids";

export type DocumentStoreOptions = {
  /** posts.json の絶対パス */
  path: string;
  /** settings.main_title が無いときに使う値（サイト説明文） */
  defaultMainTitle: string;
};

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

/**
 * posts.json の唯一の読み書き口。
 * 毎回ファイル全体を読み、毎回ファイル全体を書き直す。ロックは無い（単一書き手前提）
 */
export class DocumentStore {
  readonly path: string;
  private readonly defaultMainTitle: string;

  constructor(opts: DocumentStoreOptions) {
    this.path = opts.path;
    this.defaultMainTitle = opts.defaultMainTitle;
  }

  /** 無ければ既定のドキュメントで作る。あれば何もしない */
  async ensureExists(): Promise<void> {
    if (await this.exists()) return;
    await this.save(emptyDocument(this.defaultMainTitle));
    logger.info("[documentStore] created data file", { path: this.path });
  }

  /**
   * 読み込んで欠けているキーを既定値で埋めて返す。
   * 無い・重複した記事 id もここで振り直す（配列順なので読むたびに同じ id になる）。
   * 埋めた値はメモリ上だけで、ファイルは書き換えない
   */
  async load(): Promise<BlogDocument> {
    await this.ensureExists();

    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch (e) {
      throw new StorageError(`Failed to read ${this.path}`, this.path, e);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      throw new StorageError(`Malformed JSON in ${this.path}`, this.path, e);
    }

    const parsed = StoredDocumentSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length ? issue.path.join(".") : "root";
      throw new StorageError(
        `Invalid data in ${this.path} at ${where}: ${issue?.message ?? "unknown"}`,
        this.path,
        parsed.error
      );
    }

    return this.withDefaults(parsed.data);
  }

  /**
   * ドキュメント全体を書き出す。
   * 一時ファイルに書いてから rename するので、途中で落ちても壊れた JSON は残らない
   */
  async save(doc: BlogDocument): Promise<void> {
    const dir = path.dirname(this.path);
    const tmp = path.join(
      dir,
      `.${path.basename(this.path)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`
    );

    try {
      await mkdir(dir, { recursive: true });
      await writeFile(tmp, `${JSON.stringify(doc, null, 2)}\n`, "utf8");
      await rename(tmp, this.path);
    } catch (e) {
      await rm(tmp, { force: true });
      throw new StorageError(`Failed to write ${this.path}`, this.path, e);
    }

    logger.debug("[documentStore] saved", {
      path: this.path,
      posts: doc.posts.length,
      pages: Object.keys(doc.pages).length,
    });
  }

  /** ファイルがあるか。ENOENT 以外のエラーは StorageError */
  async exists(): Promise<boolean> {
    try {
      await access(this.path);
      return true;
    } catch (e) {
      if (isErrno(e, "ENOENT")) return false;
      throw new StorageError(`Cannot access ${this.path}`, this.path, e);
    }
  }

  private withDefaults(stored: StoredDocument): BlogDocument {
    return {
      posts: withUniqueIds(stored.posts),
      pages: stored.pages,
      settings: {
        nav_links: stored.settings.nav_links ?? defaultNavLinks(),
        main_title: stored.settings.main_title ?? this.defaultMainTitle,
      },
    };
  }
}
