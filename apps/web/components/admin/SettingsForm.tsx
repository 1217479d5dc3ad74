// apps/web/components/admin/SettingsForm.tsx
"use client";

import { useFormState } from "react-dom";
import { saveSettingsAction } from "@/app/admin/settings/actions";
import { initialFormState } from "@/lib/forms";
import SubmitButton from "./SubmitButton";

type Props = {
  initial: {
    about_content: string;
    nav_links: string;
    main_title: string;
  };
};

export default function SettingsForm({ initial }: Props) {
  const [state, formAction] = useFormState(saveSettingsAction, initialFormState);

  return (
    <form action={formAction} className="grid gap-4">
      {state.error && (
        <p role="alert" className="text-sm text-red-600">
          {state.error}
        </p>
      )}

      <label className="flex flex-col gap-1 text-xs">
        Main title
        <input name="main_title" defaultValue={initial.main_title} className="field" />
      </label>

      <label className="flex flex-col gap-1 text-xs">
        Nav links（1行1件: label|url|target）
        <textarea
          name="nav_links"
          defaultValue={initial.nav_links}
          className="field min-h-[120px] font-mono"
        />
      </label>

      <label className="flex flex-col gap-1 text-xs">
        About（HTML）
        <textarea
          name="about_content"
          defaultValue={initial.about_content}
          className="field min-h-[200px] font-mono"
        />
      </label>

      <SubmitButton label="Save" pendingLabel="Saving..." />
    </form>
  );
}
