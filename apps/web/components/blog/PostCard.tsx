// apps/web/components/blog/PostCard.tsx
import Link from "next/link";
import type { Post } from "@flatblog/shared-types";
import { formatDisplayDate } from "@flatblog/content-store";

type Props = {
  post: Post;
};

export default function PostCard({ post }: Props) {
  const date = formatDisplayDate(post.date);

  return (
    <li>
      <article className="space-y-1">
        <h2 className="text-lg font-semibold">
          <Link href={`/${post.slug}`} className="hover:text-brand-600">
            {post.title}
          </Link>
          {post.status === "draft" && (
            <span className="ml-2 rounded-full bg-amber-100 px-2 py-0.5 align-middle text-xs font-normal text-amber-800">
              draft
            </span>
          )}
        </h2>
        {date && (
          <time dateTime={post.date} className="block text-xs text-gray-500">
            {date}
          </time>
        )}
        {post.excerpt && <p className="text-sm text-gray-700">{post.excerpt}</p>}
      </article>
    </li>
  );
}
