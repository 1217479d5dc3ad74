// apps/web/app/page.tsx
import PostCard from "@/components/blog/PostCard";
import Notice from "@/components/common/Notice";
import { getOptionalAdmin } from "@/lib/auth/server";
import { getPosts } from "@/lib/store";

export const dynamic = "force-dynamic";

type PageProps = {
  searchParams: { notice?: string | string[] };
};

export default async function BlogIndexPage({ searchParams }: PageProps) {
  const admin = await getOptionalAdmin();
  const posts = await getPosts().listVisiblePosts(admin);

  return (
    <div className="container-blog">
      <Notice param={searchParams.notice} />

      {posts.length === 0 ? (
        <p className="text-sm text-gray-500">No posts yet.</p>
      ) : (
        <ul className="space-y-8">
          {posts.map((post) => (
            <PostCard key={post.id} post={post} />
          ))}
        </ul>
      )}
    </div>
  );
}
