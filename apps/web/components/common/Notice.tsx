// apps/web/components/common/Notice.tsx
import { noticeMessage } from "@/lib/notices";

type Props = {
  param: string | string[] | undefined;
};

export default function Notice({ param }: Props) {
  const message = noticeMessage(param);
  if (!message) return null;

  return (
    <p
      role="status"
      className="mb-6 rounded-lg border border-emerald-200 bg-emerald-50 px-3 py-2 text-sm text-emerald-800"
    >
      {message}
    </p>
  );
}
