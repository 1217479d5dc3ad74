// apps/web/components/admin/LoginForm.tsx
"use client";

import { useFormState } from "react-dom";
import { loginAction } from "@/app/admin/actions";
import { initialFormState } from "@/lib/forms";
import SubmitButton from "./SubmitButton";

type Props = {
  next: string;
};

export default function LoginForm({ next }: Props) {
  const [state, formAction] = useFormState(loginAction, initialFormState);

  return (
    <form action={formAction} className="grid gap-3">
      {state.error && <p className="text-sm text-red-600">{state.error}</p>}

      <input type="hidden" name="next" value={next} />

      <label className="flex flex-col gap-1 text-xs">
        Username
        <input name="username" autoComplete="username" required className="field" />
      </label>

      <label className="flex flex-col gap-1 text-xs">
        Password
        <input
          name="password"
          type="password"
          autoComplete="current-password"
          required
          className="field"
        />
      </label>

      <SubmitButton label="Log in" pendingLabel="Logging in..." />
    </form>
  );
}
