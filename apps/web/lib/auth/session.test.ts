import jwt from "jsonwebtoken";
import { describe, expect, it } from "vitest";
import {
  SESSION_MAX_AGE_SEC,
  checkCredentials,
  safeNextPath,
  signSession,
  verifySession,
} from "./session";

const SECRET = "test-secret";
const NOW = Date.UTC(2024, 6, 1, 12, 0, 0);

describe("session tokens", () => {
  it("round-trips the admin user", () => {
    const token = signSession("admin@example.com", SECRET, NOW);

    expect(verifySession(token, SECRET, NOW + 60_000)).toEqual({
      user: "admin@example.com",
    });
  });

  it("rejects tokens signed with another secret", () => {
    const token = signSession("admin@example.com", "other-secret", NOW);
    expect(verifySession(token, SECRET, NOW)).toBeNull();
  });

  it("rejects a payload swapped under an old signature", () => {
    const [header, , sig] = signSession("admin@example.com", SECRET, NOW).split(".");
    const forged = Buffer.from(
      JSON.stringify({ sub: "intruder", iat: NOW / 1000 }),
      "utf8"
    ).toString("base64url");

    expect(verifySession(`${header}.${forged}.${sig}`, SECRET, NOW)).toBeNull();
  });

  it("rejects unsigned tokens", () => {
    const header = Buffer.from(
      JSON.stringify({ alg: "none", typ: "JWT" }),
      "utf8"
    ).toString("base64url");
    const payload = Buffer.from(
      JSON.stringify({ sub: "admin@example.com", iat: NOW / 1000 }),
      "utf8"
    ).toString("base64url");

    expect(verifySession(`${header}.${payload}.`, SECRET, NOW)).toBeNull();
  });

  it("carries the user in sub with exp set from the session lifetime", () => {
    const claims = jwt.decode(signSession("admin@example.com", SECRET, NOW));

    expect(claims).toEqual({
      sub: "admin@example.com",
      iat: NOW / 1000,
      exp: NOW / 1000 + SESSION_MAX_AGE_SEC,
    });
  });

  it("expires after the session lifetime", () => {
    const token = signSession("admin@example.com", SECRET, NOW);

    expect(
      verifySession(token, SECRET, NOW + (SESSION_MAX_AGE_SEC - 1) * 1000)
    ).toEqual({ user: "admin@example.com" });
    expect(
      verifySession(token, SECRET, NOW + SESSION_MAX_AGE_SEC * 1000)
    ).toBeNull();
  });

  it("ignores missing and malformed cookies", () => {
    expect(verifySession(undefined, SECRET, NOW)).toBeNull();
    expect(verifySession("", SECRET, NOW)).toBeNull();
    expect(verifySession("no-dot", SECRET, NOW)).toBeNull();
    expect(verifySession("a.b.c", SECRET, NOW)).toBeNull();
  });
});

describe("checkCredentials", () => {
  const config = { adminUser: "admin@example.com", adminPassword: "test-password" };

  it("accepts only the configured pair", () => {
    expect(checkCredentials("admin@example.com", "test-password", config)).toBe(true);
    expect(checkCredentials("admin@example.com", "wrong", config)).toBe(false);
    expect(checkCredentials("someone@example.com", "test-password", config)).toBe(false);
    expect(checkCredentials("", "", config)).toBe(false);
  });
});

describe("safeNextPath", () => {
  it("keeps in-site paths and falls back otherwise", () => {
    expect(safeNextPath("/admin/settings", "/admin/posts")).toBe("/admin/settings");
    expect(safeNextPath("/admin/posts/a/edit?x=1", "/admin/posts")).toBe(
      "/admin/posts/a/edit?x=1"
    );
    expect(safeNextPath("", "/admin/posts")).toBe("/admin/posts");
    expect(safeNextPath(undefined, "/admin/posts")).toBe("/admin/posts");
    expect(safeNextPath("https://elsewhere.example", "/admin/posts")).toBe("/admin/posts");
    expect(safeNextPath("//elsewhere.example", "/admin/posts")).toBe("/admin/posts");
  });
});
