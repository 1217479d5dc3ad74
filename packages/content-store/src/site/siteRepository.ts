// packages/content-store/src/site/siteRepository.ts
import * as logger from "firebase-functions/logger";
import type {
  AdminSettingsInput,
  BlogDocument,
  Page,
  PageFormInput,
  SettingsFormInput,
  SiteSettings,
} from "@flatblog/shared-types";
import type { DocumentStore } from "../infra/documentStore";
import { defaultAboutPage } from "../infra/defaults";
import { NotFoundError, ValidationError } from "../errors";
import { nowIso, systemClock, type Clock } from "../utils/dates";
import { slugify, titleFromSlug } from "../utils/slug";
import { renderMarkdown } from "../utils/markdown";
import { parseNavLinks } from "./navLinks";

export type SiteRepositoryOptions = {
  /** main_title が空で保存されたときの値 */
  defaultMainTitle: string;
  clock?: Clock;
};

/** サイト設定（ナビ・メインタイトル）と固定ページ */
export class SiteRepository {
  private readonly defaultMainTitle: string;
  private readonly clock: Clock;

  constructor(
    private readonly store: DocumentStore,
    opts: SiteRepositoryOptions
  ) {
    this.defaultMainTitle = opts.defaultMainTitle;
    this.clock = opts.clock ?? systemClock;
  }

  async loadSettings(): Promise<SiteSettings> {
    const doc = await this.store.load();
    return doc.settings;
  }

  async saveSettings(input: SettingsFormInput): Promise<SiteSettings> {
    const doc = await this.store.load();
    this.applySettings(doc, input);

    await this.store.save(doc);
    logger.info("[site] settings updated", {
      navLinks: doc.settings.nav_links.length,
    });
    return doc.settings;
  }

  /**
   * 設定画面の保存。About の HTML とナビ・メインタイトルを 1 回の load → save で書く。
   * About のタイトルは既存のまま（無ければ "About"）、Markdown は空にする
   */
  async saveSiteSettings(
    input: AdminSettingsInput
  ): Promise<{ settings: SiteSettings; about: Page }> {
    const doc = await this.store.load();

    const current = doc.pages.about ?? defaultAboutPage(this.clock);
    const about: Page =
      input.about_content === undefined
        ? current
        : {
            title: current.title || "About",
            slug: "about",
            content_html: input.about_content.trim(),
            content_markdown: "",
            updated: nowIso(this.clock),
          };

    doc.pages.about = about;
    this.applySettings(doc, input);

    await this.store.save(doc);
    logger.info("[site] settings and about saved", {
      navLinks: doc.settings.nav_links.length,
    });
    return { settings: doc.settings, about };
  }

  async getPage(slug: string): Promise<Page | null> {
    const doc = await this.store.load();
    return doc.pages[slug] ?? null;
  }

  async requirePage(slug: string): Promise<Page> {
    const page = await this.getPage(slug);
    if (!page) throw new NotFoundError("page", slug);
    return page;
  }

  /** About は未作成でも空ページとして表示できるようにする */
  async getAboutPage(): Promise<Page> {
    return (await this.getPage("about")) ?? defaultAboutPage(this.clock);
  }

  /**
   * 固定ページを保存する。Markdown が来たら HTML より優先して描画する。
   * 本文が両方とも未指定なら既存の本文を残す
   */
  async savePage(rawSlug: string, input: PageFormInput): Promise<Page> {
    const slug = slugify(rawSlug);
    if (!slug) {
      throw new ValidationError("slug_required", "Slug could not be generated");
    }

    const doc = await this.store.load();
    const current = doc.pages[slug];

    const markdown = (input.content_markdown ?? "").trim();
    let html: string;
    let storedMarkdown: string;
    if (markdown) {
      html = renderMarkdown(markdown);
      storedMarkdown = markdown;
    } else if (input.content_html !== undefined) {
      html = input.content_html.trim();
      storedMarkdown = "";
    } else {
      html = current?.content_html ?? "";
      storedMarkdown = current?.content_markdown ?? "";
    }

    const page: Page = {
      title: (input.title ?? "").trim() || current?.title || titleFromSlug(slug),
      slug,
      content_html: html,
      content_markdown: storedMarkdown,
      updated: nowIso(this.clock),
    };

    doc.pages[slug] = page;
    await this.store.save(doc);

    logger.info("[site] page saved", { slug });
    return page;
  }

  private applySettings(doc: BlogDocument, input: SettingsFormInput): void {
    doc.settings = {
      nav_links: parseNavLinks(input.nav_links ?? ""),
      main_title: (input.main_title ?? "").trim() || this.defaultMainTitle,
    };
  }
}
