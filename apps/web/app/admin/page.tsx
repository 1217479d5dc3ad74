// apps/web/app/admin/page.tsx
import { redirect } from "next/navigation";
import type { Metadata } from "next";
import LoginForm from "@/components/admin/LoginForm";
import { getOptionalAdmin } from "@/lib/auth/server";
import { safeNextPath } from "@/lib/auth/session";

export const dynamic = "force-dynamic";
export const metadata: Metadata = { title: "Login" };

type PageProps = {
  searchParams: { next?: string | string[] };
};

export default async function AdminLoginPage({ searchParams }: PageProps) {
  const raw = Array.isArray(searchParams.next)
    ? searchParams.next[0]
    : searchParams.next;
  const next = safeNextPath(raw, "/admin/posts");

  const admin = await getOptionalAdmin();
  if (admin) redirect(next);

  return (
    <div className="container-blog max-w-sm space-y-6">
      <h1 className="text-xl font-bold">Admin login</h1>
      <LoginForm next={next} />
    </div>
  );
}
