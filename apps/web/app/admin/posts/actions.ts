// apps/web/app/admin/posts/actions.ts
"use server";

import { revalidatePath } from "next/cache";
import { redirect } from "next/navigation";
import { formDataToRecord } from "@flatblog/shared-schemas";
import { isNotFoundError, isValidationError } from "@flatblog/content-store";
import type { Post } from "@flatblog/shared-types";
import { requireAdmin } from "@/lib/auth/server";
import type { FormState } from "@/lib/forms";
import { withNotice } from "@/lib/notices";
import { getPosts } from "@/lib/store";

/**
 * 記事の作成 / 更新。
 * フォームの original_slug があれば編集、無ければ新規
 */
export async function savePostAction(
  _prev: FormState,
  formData: FormData
): Promise<FormState> {
  await requireAdmin();

  const fields = formDataToRecord(formData);
  const originalSlug = (fields.original_slug ?? "").trim();
  const posts = getPosts();

  let saved: Post;
  try {
    const existing = originalSlug ? await posts.requireBySlug(originalSlug) : null;
    saved = await posts.savePost(fields, existing);
  } catch (e) {
    if (isValidationError(e)) return { error: e.message };
    if (isNotFoundError(e)) {
      return { error: "This post no longer exists. Reload the list and try again." };
    }
    console.error("[admin/posts] save failed", e);
    throw e;
  }

  revalidatePath("/");
  revalidatePath(`/${saved.slug}`);
  if (originalSlug && originalSlug !== saved.slug) {
    revalidatePath(`/${originalSlug}`);
  }
  revalidatePath("/admin/posts");

  redirect(withNotice("/admin/posts", originalSlug ? "updated" : "created"));
}
