import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StorageError, defaultNavLinks } from "@flatblog/content-store";
import type { BlogDocument } from "@flatblog/shared-types";
import { importWordPress, mergeFromExport } from "./commands";

const clock = () => new Date(Date.UTC(2024, 6, 1, 12, 0, 0));
const FIXTURE = fileURLToPath(
  new URL("../../../fixtures/sample-export.xml", import.meta.url)
);

describe("wxr commands", () => {
  let dir: string;
  let dataPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "flatblog-wxr-"));
    dataPath = path.join(dir, "data", "posts.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const readDoc = async (): Promise<BlogDocument> =>
    JSON.parse(await readFile(dataPath, "utf8"));

  describe("importWordPress", () => {
    it("writes a fresh document, replacing what was there", async () => {
      await importWordPress(FIXTURE, { dataPath, clock });
      await writeFile(dataPath, "{ not json", "utf8");

      const summary = await importWordPress(FIXTURE, { dataPath, clock });

      expect(summary).toEqual({ posts: 2, pages: 1, dataPath });
      const doc = await readDoc();
      expect(doc.posts.map((p) => p.slug)).toEqual(["second", "first-post"]);
      expect(Object.keys(doc.pages)).toEqual(["about-me"]);
      expect(doc.settings).toEqual({ nav_links: defaultNavLinks(), main_title: "" });
    });
  });

  describe("mergeFromExport", () => {
    it("requires an existing data file", async () => {
      await expect(
        mergeFromExport(FIXTURE, { dataPath, clock })
      ).rejects.toBeInstanceOf(StorageError);
    });

    it("adds missing pages and settings without touching posts", async () => {
      const legacyPosts = [
        { id: 1, slug: "kept", title: "Kept", date: "2022-02-02T00:00:00" },
      ];
      await importWordPress(FIXTURE, { dataPath, clock });
      await writeFile(dataPath, JSON.stringify(legacyPosts), "utf8");

      const summary = await mergeFromExport(FIXTURE, { dataPath, clock });

      expect(summary).toEqual({
        posts: 1,
        pages: 1,
        navLinks: 4,
        addedPages: ["about-me"],
        dataPath,
      });
      const doc = await readDoc();
      expect(doc.posts.map((p) => p.slug)).toEqual(["kept"]);
      expect(doc.pages["about-me"].title).toBe("About-Me");
      expect(doc.settings).toEqual({ nav_links: defaultNavLinks(), main_title: "" });
    });
  });
});
