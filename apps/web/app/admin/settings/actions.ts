// apps/web/app/admin/settings/actions.ts
"use server";

import { revalidatePath } from "next/cache";
import { redirect } from "next/navigation";
import { SettingsFormSchema, formDataToRecord } from "@flatblog/shared-schemas";
import { isValidationError } from "@flatblog/content-store";
import { requireAdmin } from "@/lib/auth/server";
import type { FormState } from "@/lib/forms";
import { withNotice } from "@/lib/notices";
import { getSite } from "@/lib/store";

/** About の HTML・ナビリンク・メインタイトルをまとめて保存 */
export async function saveSettingsAction(
  _prev: FormState,
  formData: FormData
): Promise<FormState> {
  await requireAdmin();

  const form = SettingsFormSchema.parse(formDataToRecord(formData));
  const site = getSite();

  try {
    await site.saveSiteSettings({
      about_content: form.about_content,
      nav_links: form.nav_links,
      main_title: form.main_title,
    });
  } catch (e) {
    if (isValidationError(e)) return { error: e.message };
    console.error("[admin/settings] save failed", e);
    throw e;
  }

  // ヘッダーは全ページに出るのでレイアウトごと
  revalidatePath("/", "layout");
  redirect(withNotice("/admin/settings", "settings"));
}
