// apps/web/app/admin/posts/new/page.tsx
import type { Metadata } from "next";
import { nowIso } from "@flatblog/content-store";
import PostEditorForm from "@/components/admin/PostEditorForm";
import { requireAdmin } from "@/lib/auth/server";

export const dynamic = "force-dynamic";
export const metadata: Metadata = { title: "New post" };

export default async function NewPostPage() {
  await requireAdmin();

  return (
    <div className="container-blog space-y-6">
      <h1 className="text-xl font-bold">New post</h1>
      <PostEditorForm
        initial={{
          title: "",
          slug: "",
          content_markdown: "",
          content_html: "",
          date: nowIso(),
          tags: "",
          categories: "",
          status: "publish",
          excerpt: "",
        }}
      />
    </div>
  );
}
