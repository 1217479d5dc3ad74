// tools/src/scripts/importWordPress.ts
// Usage: npm run import:wp -- path/to/export.xml
import { BlogError, loadSiteConfig } from "@flatblog/content-store";
import { importWordPress } from "../lib/wxr/commands";

async function main() {
  const xmlPath = process.argv[2];
  if (!xmlPath) {
    // eslint-disable-next-line no-console
    console.error("Usage: import:wp <export.xml>");
    process.exit(1);
  }

  const { dataPath } = loadSiteConfig();
  const summary = await importWordPress(xmlPath, { dataPath });

  // eslint-disable-next-line no-console
  console.log(
    `Wrote ${summary.posts} posts and ${summary.pages} pages to ${summary.dataPath}`
  );
}

main().catch((e) => {
  // eslint-disable-next-line no-console
  console.error(e instanceof BlogError ? e.message : e);
  process.exit(1);
});
