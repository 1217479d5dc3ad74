// apps/web/components/admin/PostEditorForm.tsx
"use client";

import { useFormState } from "react-dom";
import type { PostFormInput } from "@flatblog/shared-types";
import { savePostAction } from "@/app/admin/posts/actions";
import { initialFormState } from "@/lib/forms";
import SubmitButton from "./SubmitButton";

type Props = {
  initial: Required<PostFormInput>;
  /** 編集時だけ。新規作成なら undefined */
  originalSlug?: string;
};

export default function PostEditorForm({ initial, originalSlug }: Props) {
  const [state, formAction] = useFormState(savePostAction, initialFormState);

  return (
    <form action={formAction} className="grid gap-4">
      {state.error && (
        <p role="alert" className="text-sm text-red-600">
          {state.error}
        </p>
      )}

      {originalSlug && <input type="hidden" name="original_slug" value={originalSlug} />}

      <label className="flex flex-col gap-1 text-xs">
        Title
        <input name="title" defaultValue={initial.title} className="field" />
      </label>

      <div className="grid gap-4 sm:grid-cols-2">
        <label className="flex flex-col gap-1 text-xs">
          Slug（空ならタイトルから）
          <input name="slug" defaultValue={initial.slug} className="field font-mono" />
        </label>

        <label className="flex flex-col gap-1 text-xs">
          Date（YYYY-MM-DDTHH:MM:SS）
          <input name="date" defaultValue={initial.date} className="field font-mono" />
        </label>
      </div>

      <div className="grid gap-4 sm:grid-cols-3">
        <label className="flex flex-col gap-1 text-xs">
          Tags（カンマ区切り）
          <input name="tags" defaultValue={initial.tags} className="field" />
        </label>

        <label className="flex flex-col gap-1 text-xs">
          Categories（カンマ区切り）
          <input name="categories" defaultValue={initial.categories} className="field" />
        </label>

        <label className="flex flex-col gap-1 text-xs">
          Status
          <select name="status" defaultValue={initial.status} className="field">
            <option value="publish">publish</option>
            <option value="draft">draft</option>
          </select>
        </label>
      </div>

      <label className="flex flex-col gap-1 text-xs">
        Body（Markdown。入力があれば HTML より優先）
        <textarea
          name="content_markdown"
          defaultValue={initial.content_markdown}
          className="field min-h-[260px] font-mono"
        />
      </label>

      <label className="flex flex-col gap-1 text-xs">
        Body（HTML）
        <textarea
          name="content_html"
          defaultValue={initial.content_html}
          className="field min-h-[160px] font-mono"
        />
      </label>

      <label className="flex flex-col gap-1 text-xs">
        Excerpt（空なら本文の先頭から）
        <textarea name="excerpt" defaultValue={initial.excerpt} className="field min-h-[80px]" />
      </label>

      <SubmitButton label={originalSlug ? "Update" : "Create"} pendingLabel="Saving..." />
    </form>
  );
}
