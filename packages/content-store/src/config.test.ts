import { describe, expect, it } from "vitest";
import { loadSiteConfig } from "./config";

describe("loadSiteConfig", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadSiteConfig({}, "/srv/blog")).toEqual({
      dataPath: "/srv/blog/data/posts.json",
      siteTitle: "flatblog",
      siteDescription: "A small flat-file blog",
      adminUser: "admin@example.com",
      adminPassword: "change-me",
      sessionSecret: "dev-secret-change-me",
    });
  });

  it("treats blank values as unset and trims text settings", () => {
    const config = loadSiteConfig(
      {
        SITE_TITLE: "   ",
        SITE_DESCRIPTION: " Notes on things ",
        ADMIN_PASSWORD: "test-password",
        SESSION_SECRET: "test-secret",
      },
      "/srv/blog"
    );

    expect(config.siteTitle).toBe("flatblog");
    expect(config.siteDescription).toBe("Notes on things");
    expect(config.adminPassword).toBe("test-password");
    expect(config.sessionSecret).toBe("test-secret");
  });

  it("resolves relative data paths against the working directory", () => {
    expect(
      loadSiteConfig({ FLATBLOG_DATA_PATH: "content/blog.json" }, "/srv/blog").dataPath
    ).toBe("/srv/blog/content/blog.json");
    expect(
      loadSiteConfig({ FLATBLOG_DATA_PATH: "/var/lib/flatblog/posts.json" }, "/srv/blog")
        .dataPath
    ).toBe("/var/lib/flatblog/posts.json");
  });
});
