// packages/content-store/src/utils/dates.ts

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

// YYYY-MM-DD / YYYY-MM-DDTHH:MM[:SS[.ffffff]] / 区切りは T か空白 / 末尾に Z か ±HH[:MM]
const ISO_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

const MONTHS = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
];

function offsetMinutes(raw: string | undefined): number {
  if (!raw || raw.toUpperCase() === "Z") return 0;
  const sign = raw.startsWith("-") ? -1 : 1;
  const digits = raw.slice(1).replace(":", "");
  const h = Number(digits.slice(0, 2));
  const m = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (h * 60 + m);
}

/**
 * 記事の日付文字列を Date にする。読めなければ null。
 * タイムゾーン無しの値は UTC とみなす
 */
export function parseDate(value: string | null | undefined): Date | null {
  const s = (value ?? "").trim();
  if (!s) return null;

  const m = ISO_RE.exec(s);
  if (!m) return null;

  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const hour = m[4] ? Number(m[4]) : 0;
  const minute = m[5] ? Number(m[5]) : 0;
  const second = m[6] ? Number(m[6]) : 0;
  const ms = m[7] ? Number(m[7].slice(0, 3).padEnd(3, "0")) : 0;

  if (month < 1 || month > 12) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  // 2月30日などは Date.UTC が繰り上げるので、日付が変わったら不正扱い
  const base = new Date(Date.UTC(year, month - 1, day));
  if (base.getUTCDate() !== day || base.getUTCMonth() !== month - 1) {
    return null;
  }

  const utc =
    Date.UTC(year, month - 1, day, hour, minute, second, ms) -
    offsetMinutes(m[8]) * 60_000;
  return new Date(utc);
}

/** YYYY-MM-DDTHH:MM:SS（UTC・秒未満切り捨て） */
export function formatIso(date: Date): string {
  return date.toISOString().slice(0, 19);
}

export function nowIso(clock: Clock = systemClock): string {
  return formatIso(clock());
}

/** 並び替え用。読めない日付は最小値 */
export function toTimestamp(value: string | null | undefined): number {
  const d = parseDate(value);
  return d ? d.getTime() : Number.NEGATIVE_INFINITY;
}

/** 新しい順。同時刻・日付なし同士は 0（安定ソートで元の順を保つ） */
export function compareByDateDesc(
  a: { date?: string | null },
  b: { date?: string | null }
): number {
  const ta = toTimestamp(a.date);
  const tb = toTimestamp(b.date);
  if (ta === tb) return 0;
  return ta < tb ? 1 : -1;
}

/** 表示用: "Jan 05, 2024"。読めない日付は空文字 */
export function formatDisplayDate(value: string | null | undefined): string {
  const d = parseDate(value);
  if (!d) return "";
  const day = String(d.getUTCDate()).padStart(2, "0");
  return `${MONTHS[d.getUTCMonth()]} ${day}, ${d.getUTCFullYear()}`;
}
