// apps/web/lib/auth/session.ts
// cookie の署名・検証（next/headers に依存しないのでテストから直接呼べる）
import crypto from "node:crypto";
import jwt from "jsonwebtoken";
import type { AdminIdentity } from "@flatblog/shared-types";

export const SESSION_COOKIE_NAME = "fb_session";

/** 14日 */
export const SESSION_MAX_AGE_SEC = 14 * 24 * 60 * 60;

type Credentials = {
  adminUser: string;
  adminPassword: string;
};

function safeEqual(a: string, b: string): boolean {
  const ab = Buffer.from(a, "utf8");
  const bb = Buffer.from(b, "utf8");
  if (ab.length !== bb.length) return false;
  return crypto.timingSafeEqual(ab, bb);
}

/** user を sub に入れた HS256 の JWT。exp は発行から SESSION_MAX_AGE_SEC */
export function signSession(
  user: string,
  secret: string,
  now: number = Date.now()
): string {
  return jwt.sign({ sub: user, iat: Math.floor(now / 1000) }, secret, {
    algorithm: "HS256",
    expiresIn: SESSION_MAX_AGE_SEC,
  });
}

/** 署名と有効期限を確かめる。だめなら null */
export function verifySession(
  token: string | undefined,
  secret: string,
  now: number = Date.now()
): AdminIdentity | null {
  if (!token) return null;

  try {
    const payload = jwt.verify(token, secret, {
      algorithms: ["HS256"],
      clockTimestamp: Math.floor(now / 1000),
    });
    if (typeof payload === "string" || typeof payload.sub !== "string") {
      return null;
    }
    return payload.sub ? { user: payload.sub } : null;
  } catch (err) {
    // TokenExpiredError / NotBeforeError もこのサブクラス
    if (err instanceof jwt.JsonWebTokenError) return null;
    throw err;
  }
}

export function checkCredentials(
  username: string,
  password: string,
  config: Credentials
): boolean {
  // 片方だけ比較して早く返さない
  const userOk = safeEqual(username, config.adminUser);
  const passOk = safeEqual(password, config.adminPassword);
  return userOk && passOk;
}

/** ログイン後の戻り先。サイト内の絶対パスだけ許す */
export function safeNextPath(
  next: string | null | undefined,
  fallback: string
): string {
  const v = (next ?? "").trim();
  if (!v.startsWith("/") || v.startsWith("//") || v.startsWith("/\\")) {
    return fallback;
  }
  return v;
}
