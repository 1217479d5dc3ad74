// apps/web/lib/forms.ts

/** useFormState で Server Action とやり取りする状態 */
export type FormState = {
  error: string | null;
};

export const initialFormState: FormState = { error: null };
