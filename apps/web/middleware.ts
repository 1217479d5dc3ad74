// apps/web/middleware.ts
import { NextResponse } from "next/server";
import type { NextRequest } from "next/server";

// Server Component からリクエストのパスを読めるようにする（requireAdmin の戻り先）
export function middleware(req: NextRequest) {
  const reqHeaders = new Headers(req.headers);
  reqHeaders.set("x-pathname", `${req.nextUrl.pathname}${req.nextUrl.search}`);

  return NextResponse.next({ request: { headers: reqHeaders } });
}

export const config = {
  matcher: "/((?!_next/static|_next/image|favicon.ico).*)",
};
