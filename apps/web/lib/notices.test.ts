import { describe, expect, it } from "vitest";
import { noticeMessage, withNotice } from "./notices";

describe("noticeMessage", () => {
  it("maps known keys to messages", () => {
    expect(noticeMessage("created")).toBe("Post created");
    expect(noticeMessage("updated")).toBe("Post updated");
    expect(noticeMessage("settings")).toBe("Settings updated");
    expect(noticeMessage(["login", "logout"])).toBe("Logged in");
  });

  it("ignores unknown or missing keys", () => {
    expect(noticeMessage(undefined)).toBeNull();
    expect(noticeMessage("")).toBeNull();
    expect(noticeMessage("toString")).toBeNull();
    expect(noticeMessage("<script>")).toBeNull();
  });
});

describe("withNotice", () => {
  it("appends the notice parameter", () => {
    expect(withNotice("/admin/posts", "created")).toBe("/admin/posts?notice=created");
    expect(withNotice("/admin/posts/a/edit?x=1", "login")).toBe(
      "/admin/posts/a/edit?x=1&notice=login"
    );
  });
});
