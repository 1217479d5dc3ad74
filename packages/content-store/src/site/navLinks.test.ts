import { describe, expect, it } from "vitest";
import { defaultNavLinks } from "../infra/defaults";
import { formatNavLinks, parseNavLinks } from "./navLinks";

describe("parseNavLinks", () => {
  it("reads label|url|target lines", () => {
    const text = [
      "Blog|/|_self",
      " Mastodon | https://social.example/@me ",
      "",
      "Mail|mailto:me@example.com",
      "Docs|http://docs.example|_top",
    ].join("\r\n");

    expect(parseNavLinks(text)).toEqual([
      { label: "Blog", url: "/", target: "_self" },
      { label: "Mastodon", url: "https://social.example/@me", target: "_blank" },
      { label: "Mail", url: "mailto:me@example.com", target: "_self" },
      { label: "Docs", url: "http://docs.example", target: "_top" },
    ]);
  });

  it("skips lines without both label and url", () => {
    expect(parseNavLinks("Only label\n|/x\nOk|/ok")).toEqual([
      { label: "Ok", url: "/ok", target: "_self" },
    ]);
  });

  it("falls back to the default links when nothing is usable", () => {
    expect(parseNavLinks("")).toEqual(defaultNavLinks());
    expect(parseNavLinks("nope\n\n")).toEqual(defaultNavLinks());
  });
});

describe("formatNavLinks", () => {
  it("writes one line per link", () => {
    expect(
      formatNavLinks([
        { label: "About", url: "/about", target: "_self" },
        { label: "GitHub", url: "", target: "_blank" },
      ])
    ).toBe("About|/about|_self\nGitHub||_blank");
  });
});
