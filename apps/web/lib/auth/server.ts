// apps/web/lib/auth/server.ts
import "server-only";
import { cookies, headers } from "next/headers";
import { redirect } from "next/navigation";
import type { AdminIdentity } from "@flatblog/shared-types";
import { getSiteConfig } from "@/lib/site-config";
import {
  SESSION_COOKIE_NAME,
  SESSION_MAX_AGE_SEC,
  signSession,
  verifySession,
} from "./session";

export async function getOptionalAdmin(): Promise<AdminIdentity | null> {
  const token = cookies().get(SESSION_COOKIE_NAME)?.value;
  const { sessionSecret, adminUser } = getSiteConfig();

  const identity = verifySession(token, sessionSecret);
  // ADMIN_USER を変えたら古い cookie は無効
  if (!identity || identity.user !== adminUser) return null;
  return identity;
}

/** 未ログインならログイン画面へ（元のパスを next に載せる） */
export async function requireAdmin(): Promise<AdminIdentity> {
  const admin = await getOptionalAdmin();
  if (admin) return admin;

  const path = headers().get("x-pathname") || "/admin/posts";
  redirect(`/admin?next=${encodeURIComponent(path)}`);
}

/** Server Action / Route Handler からだけ呼べる */
export function startSession(user: string): void {
  cookies().set(SESSION_COOKIE_NAME, signSession(user, getSiteConfig().sessionSecret), {
    httpOnly: true,
    secure: process.env.NODE_ENV === "production",
    sameSite: "lax",
    path: "/",
    maxAge: SESSION_MAX_AGE_SEC,
  });
}
