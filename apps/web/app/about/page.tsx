// apps/web/app/about/page.tsx
import type { Metadata } from "next";
import PostBody from "@/components/blog/PostBody";
import { getSite } from "@/lib/store";

export const dynamic = "force-dynamic";

export async function generateMetadata(): Promise<Metadata> {
  const page = await getSite().getAboutPage();
  return { title: page.title };
}

export default async function AboutPage() {
  const page = await getSite().getAboutPage();

  return (
    <article className="container-blog space-y-6">
      <h1 className="text-2xl font-bold tracking-tight">{page.title}</h1>
      {page.content_html ? (
        <PostBody html={page.content_html} />
      ) : (
        <p className="text-sm text-gray-500">Nothing here yet.</p>
      )}
    </article>
  );
}
