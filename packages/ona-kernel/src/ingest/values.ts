// Cell-level value parsing. Missing is always null; NaN never leaves this module.

const MISSING_TOKENS = new Set(["", "na", "n/a", "nan", "null", "none", "-"]);

export function parseNumberCell(raw: string | undefined): number | null {
  if (raw == null) return null;
  const s = raw.trim();
  if (MISSING_TOKENS.has(s.toLowerCase())) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

// 2024-01-31T10:00:00Z, 2024-01-31 10:00:00+02:00
const ISO_ZONED = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})$/;
// 2024/01/31 10:00:00, 2024-01-31T10:00, 2024-01-31
const YMD = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3})\d*)?)?)?$/;
// 01/31/2024 10:00
const MDY = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

function utcMs(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
  ms = 0
): number | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;
  const t = Date.UTC(year, month - 1, day, hour, minute, second, ms);
  // Reject roll-overs such as 2024-02-30.
  const d = new Date(t);
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return null;
  return t;
}

function intOr(s: string | undefined, fallback: number): number {
  return s === undefined ? fallback : Number(s);
}

/**
 * Parses an instrument timestamp into unix ms. Timestamps without a zone are taken as UTC.
 * Returns null when the text is not a recognised, valid instant.
 */
export function parseTimestamp(raw: string | undefined): number | null {
  if (raw == null) return null;
  const s = raw.trim();
  if (!s) return null;

  if (ISO_ZONED.test(s)) {
    const t = Date.parse(s.replace(" ", "T"));
    return Number.isFinite(t) ? t : null;
  }

  const ymd = s.match(YMD);
  if (ymd) {
    const msText = ymd[7];
    const ms = msText === undefined ? 0 : Number(msText.padEnd(3, "0"));
    return utcMs(
      Number(ymd[1]),
      Number(ymd[2]),
      Number(ymd[3]),
      intOr(ymd[4], 0),
      intOr(ymd[5], 0),
      intOr(ymd[6], 0),
      ms
    );
  }

  const mdy = s.match(MDY);
  if (mdy) {
    return utcMs(Number(mdy[3]), Number(mdy[1]), Number(mdy[2]), intOr(mdy[4], 0), intOr(mdy[5], 0), intOr(mdy[6], 0));
  }

  return null;
}
