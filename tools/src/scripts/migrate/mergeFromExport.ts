// tools/src/scripts/migrate/mergeFromExport.ts
// 既存 posts.json に About などのページとナビ設定を足す一回きりの移行
// Usage: npm run migrate:merge -- path/to/export.xml
import { BlogError, loadSiteConfig } from "@flatblog/content-store";
import { mergeFromExport } from "../../lib/wxr/commands";

async function main() {
  const xmlPath = process.argv[2];
  if (!xmlPath) {
    // eslint-disable-next-line no-console
    console.error("Usage: migrate:merge <export.xml>");
    process.exit(1);
  }

  const { dataPath } = loadSiteConfig();
  const summary = await mergeFromExport(xmlPath, { dataPath });

  // eslint-disable-next-line no-console
  console.log(
    `[mergeFromExport] added pages: ${summary.addedPages.join(", ") || "(none)"}`
  );
  // eslint-disable-next-line no-console
  console.log(
    `Migrated data at ${summary.dataPath}: ${summary.posts} posts, ${summary.pages} pages, ${summary.navLinks} nav links.`
  );
}

main().catch((e) => {
  // eslint-disable-next-line no-console
  console.error(e instanceof BlogError ? e.message : e);
  process.exit(1);
});
