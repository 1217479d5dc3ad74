import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { BlogDocument } from "@flatblog/shared-types";
import { StorageError } from "../errors";
import { defaultNavLinks } from "./defaults";
import { DocumentStore } from "./documentStore";

describe("DocumentStore", () => {
  let dir: string;
  let dataPath: string;
  let store: DocumentStore;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "flatblog-store-"));
    dataPath = path.join(dir, "data", "posts.json");
    store = new DocumentStore({ path: dataPath, defaultMainTitle: "Test blog" });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("ensureExists", () => {
    it("creates parent directories and a default document", async () => {
      await store.ensureExists();

      const written = JSON.parse(await readFile(dataPath, "utf8"));
      expect(written).toEqual({
        posts: [],
        pages: {},
        settings: { nav_links: defaultNavLinks(), main_title: "Test blog" },
      });
    });

    it("never touches an existing file", async () => {
      await store.ensureExists();
      const custom = '{"posts":[{"id":9,"slug":"kept","title":"Kept"}]}';
      await writeFile(dataPath, custom, "utf8");

      await store.ensureExists();
      await store.ensureExists();

      expect(await readFile(dataPath, "utf8")).toBe(custom);
    });
  });

  describe("load", () => {
    it("fills missing keys without rewriting the file", async () => {
      await store.ensureExists();
      await writeFile(dataPath, '{"posts": []}', "utf8");

      const doc = await store.load();

      expect(doc).toEqual({
        posts: [],
        pages: {},
        settings: { nav_links: defaultNavLinks(), main_title: "Test blog" },
      });
      expect(await readFile(dataPath, "utf8")).toBe('{"posts": []}');
    });

    it("keeps stored settings", async () => {
      await store.ensureExists();
      await writeFile(
        dataPath,
        JSON.stringify({
          settings: {
            main_title: "",
            nav_links: [{ label: "Home", url: "/", target: "_self" }],
          },
        }),
        "utf8"
      );

      const doc = await store.load();

      expect(doc.settings).toEqual({
        main_title: "",
        nav_links: [{ label: "Home", url: "/", target: "_self" }],
      });
    });

    it("reads a legacy file holding only the post array", async () => {
      await store.ensureExists();
      await writeFile(
        dataPath,
        JSON.stringify([{ id: 3, slug: "legacy", title: "Legacy" }]),
        "utf8"
      );

      const doc = await store.load();

      expect(doc.posts).toEqual([
        {
          id: 3,
          slug: "legacy",
          title: "Legacy",
          date: "",
          modified: "",
          status: "publish",
          tags: [],
          categories: [],
          content_markdown: "",
          content_html: "",
          excerpt: "",
          author: "",
        },
      ]);
      expect(doc.pages).toEqual({});
      expect(doc.settings.main_title).toBe("Test blog");
    });

    it("reads unknown statuses as draft", async () => {
      await store.ensureExists();
      await writeFile(
        dataPath,
        JSON.stringify({
          posts: [
            { id: 1, slug: "a", status: "private" },
            { id: 2, slug: "b", status: "draft" },
            { id: 3, slug: "c", status: "publish" },
          ],
        }),
        "utf8"
      );

      const doc = await store.load();

      expect(doc.posts.map((p) => p.status)).toEqual([
        "draft",
        "draft",
        "publish",
      ]);
    });

    it("gives posts with missing, zero or repeated ids fresh ones", async () => {
      await store.ensureExists();
      const raw = JSON.stringify({
        posts: [
          { slug: "a" },
          { id: 0, slug: "b" },
          { id: 4, slug: "c" },
          { id: 4, slug: "d" },
        ],
      });
      await writeFile(dataPath, raw, "utf8");

      const first = await store.load();
      const second = await store.load();

      expect(first.posts.map((p) => [p.slug, p.id])).toEqual([
        ["a", 5],
        ["b", 6],
        ["c", 4],
        ["d", 7],
      ]);
      expect(second.posts).toEqual(first.posts);
      expect(await readFile(dataPath, "utf8")).toBe(raw);
    });

    it("raises StorageError on malformed JSON", async () => {
      await store.ensureExists();
      await writeFile(dataPath, "{not json", "utf8");

      await expect(store.load()).rejects.toBeInstanceOf(StorageError);
      await expect(store.load()).rejects.toThrow(
        `Malformed JSON in ${dataPath}`
      );
    });

    it("raises StorageError on a structurally invalid document", async () => {
      await store.ensureExists();
      await writeFile(dataPath, '{"posts": "nope"}', "utf8");

      await expect(store.load()).rejects.toBeInstanceOf(StorageError);
    });
  });

  describe("save", () => {
    it("writes pretty-printed JSON and leaves no temporary files", async () => {
      const doc: BlogDocument = {
        posts: [],
        pages: {
          about: {
            title: "About",
            slug: "about",
            content_html: "<p>Hi</p>",
            content_markdown: "",
            updated: "2024-01-01T00:00:00",
          },
        },
        settings: { nav_links: [], main_title: "Über" },
      };

      await store.save(doc);

      expect(await readFile(dataPath, "utf8")).toBe(
        `${JSON.stringify(doc, null, 2)}\n`
      );
      expect(await readdir(path.dirname(dataPath))).toEqual(["posts.json"]);
      expect(await store.load()).toEqual(doc);
    });
  });
});
