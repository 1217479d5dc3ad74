// apps/web/app/admin/posts/page.tsx
import Link from "next/link";
import type { Metadata } from "next";
import { formatDisplayDate } from "@flatblog/content-store";
import Notice from "@/components/common/Notice";
import { requireAdmin } from "@/lib/auth/server";
import { getPosts } from "@/lib/store";

export const dynamic = "force-dynamic";
export const metadata: Metadata = { title: "Posts" };

type PageProps = {
  searchParams: { notice?: string | string[] };
};

export default async function AdminPostsPage({ searchParams }: PageProps) {
  await requireAdmin();
  const posts = await getPosts().listPosts();

  return (
    <div className="container-blog space-y-6">
      <Notice param={searchParams.notice} />

      <header className="flex items-center justify-between">
        <h1 className="text-xl font-bold">Posts</h1>
        <div className="flex gap-2 text-xs">
          <Link href="/admin/settings" className="rounded-full border px-3 py-2">
            Settings
          </Link>
          <Link
            href="/admin/posts/new"
            className="rounded-full bg-brand-600 px-3 py-2 font-semibold text-white"
          >
            New post
          </Link>
        </div>
      </header>

      {posts.length === 0 ? (
        <p className="text-sm text-gray-500">No posts yet.</p>
      ) : (
        <table className="w-full text-left text-sm">
          <thead className="text-xs text-gray-500">
            <tr>
              <th className="py-2">Title</th>
              <th className="py-2">Date</th>
              <th className="py-2">Status</th>
              <th className="py-2" />
            </tr>
          </thead>
          <tbody className="divide-y divide-black/5">
            {posts.map((post) => (
              <tr key={post.id}>
                <td className="py-2">
                  <Link href={`/${post.slug}`} className="hover:text-brand-600">
                    {post.title}
                  </Link>
                  <span className="block font-mono text-xs text-gray-400">{post.slug}</span>
                </td>
                <td className="py-2 text-xs text-gray-500">
                  {formatDisplayDate(post.date)}
                </td>
                <td className="py-2 text-xs">{post.status}</td>
                <td className="py-2 text-right text-xs">
                  <Link
                    href={`/admin/posts/${post.slug}/edit`}
                    className="text-brand-600 hover:underline"
                  >
                    Edit
                  </Link>
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </div>
  );
}
