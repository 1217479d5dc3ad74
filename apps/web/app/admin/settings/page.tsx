// apps/web/app/admin/settings/page.tsx
import type { Metadata } from "next";
import { formatNavLinks } from "@flatblog/content-store";
import SettingsForm from "@/components/admin/SettingsForm";
import Notice from "@/components/common/Notice";
import { requireAdmin } from "@/lib/auth/server";
import { getSite } from "@/lib/store";

export const dynamic = "force-dynamic";
export const metadata: Metadata = { title: "Settings" };

type PageProps = {
  searchParams: { notice?: string | string[] };
};

export default async function AdminSettingsPage({ searchParams }: PageProps) {
  await requireAdmin();
  const site = getSite();
  const [settings, about] = await Promise.all([
    site.loadSettings(),
    site.getAboutPage(),
  ]);

  return (
    <div className="container-blog space-y-6">
      <Notice param={searchParams.notice} />
      <h1 className="text-xl font-bold">Settings</h1>
      <SettingsForm
        initial={{
          about_content: about.content_html,
          nav_links: formatNavLinks(settings.nav_links),
          main_title: settings.main_title,
        }}
      />
    </div>
  );
}
