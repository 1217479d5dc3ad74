// apps/web/components/blog/PostBody.tsx

type Props = {
  html: string;
};

/** 保存済みの HTML をそのまま出す（Markdown は保存時に描画済み） */
export default function PostBody({ html }: Props) {
  return (
    <div
      className="prose prose-neutral max-w-none"
      dangerouslySetInnerHTML={{ __html: html }}
    />
  );
}
