// apps/web/lib/notices.ts

export const NOTICES = {
  created: "Post created",
  updated: "Post updated",
  settings: "Settings updated",
  login: "Logged in",
  logout: "Logged out",
} as const;

export type NoticeKey = keyof typeof NOTICES;

function isNoticeKey(v: string): v is NoticeKey {
  return Object.prototype.hasOwnProperty.call(NOTICES, v);
}

/** ?notice=... → 表示する文言。知らないキーは無視 */
export function noticeMessage(
  param: string | string[] | undefined
): string | null {
  const key = Array.isArray(param) ? param[0] : param;
  if (!key || !isNoticeKey(key)) return null;
  return NOTICES[key];
}

/** path に notice を付ける（既存のクエリは残す） */
export function withNotice(path: string, key: NoticeKey): string {
  const sep = path.includes("?") ? "&" : "?";
  return `${path}${sep}notice=${key}`;
}
