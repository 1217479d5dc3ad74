// packages/content-store/src/infra/defaults.ts
import type { BlogDocument, NavLink, Page } from "@flatblog/shared-types";
import { nowIso, systemClock, type Clock } from "../utils/dates";

// 呼び出しごとに新しい配列を返す（共有の可変デフォルトを作らない）
export function defaultNavLinks(): NavLink[] {
  return [
    { label: "About", url: "/about", target: "_self" },
    { label: "Contact", url: "mailto:", target: "_self" },
    { label: "LinkedIn", url: "", target: "_blank" },
    { label: "GitHub", url: "", target: "_blank" },
  ];
}

export function emptyDocument(mainTitle: string): BlogDocument {
  return {
    posts: [],
    pages: {},
    settings: {
      nav_links: defaultNavLinks(),
      main_title: mainTitle,
    },
  };
}

/** About 未作成時に表示・編集の起点にする空ページ */
export function defaultAboutPage(clock: Clock = systemClock): Page {
  return {
    title: "About",
    slug: "about",
    content_html: "",
    content_markdown: "",
    updated: nowIso(clock),
  };
}
