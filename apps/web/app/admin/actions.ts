// apps/web/app/admin/actions.ts
"use server";

import { redirect } from "next/navigation";
import { LoginFormSchema, formDataToRecord } from "@flatblog/shared-schemas";
import { checkCredentials, safeNextPath } from "@/lib/auth/session";
import { startSession } from "@/lib/auth/server";
import type { FormState } from "@/lib/forms";
import { withNotice } from "@/lib/notices";
import { getSiteConfig } from "@/lib/site-config";

export async function loginAction(
  _prev: FormState,
  formData: FormData
): Promise<FormState> {
  const form = LoginFormSchema.parse(formDataToRecord(formData));
  const config = getSiteConfig();

  if (!checkCredentials(form.username.trim(), form.password, config)) {
    return { error: "Invalid credentials" };
  }

  startSession(config.adminUser);
  redirect(withNotice(safeNextPath(form.next, "/admin/posts"), "login"));
}
