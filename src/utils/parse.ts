export interface ParsedDate {
  display: string;
  year: string;
  yearMonth: string;
  isoDate: string;
}

const ISO_LIKE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?(?:Z|[+-]\d{2}(?::?\d{2})?)?$/i;

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= lastDay;
}

/**
 * Parses an ISO-8601-like timestamp. A trailing zone marker is dropped and the
 * wall-clock time kept as written. Unparsable input comes back as the display
 * string with the derived fields left empty.
 */
export function parseDate(text: string | null | undefined): ParsedDate {
  if (!text) return { display: "", year: "", yearMonth: "", isoDate: "" };

  const m = ISO_LIKE.exec(text.trim());
  if (!m) return { display: text, year: "", yearMonth: "", isoDate: "" };

  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const hour = m[4] ? Number(m[4]) : 0;
  const minute = m[5] ? Number(m[5]) : 0;
  const second = m[6] ? Number(m[6]) : 0;

  if (!isValidCalendarDate(year, month, day) || hour > 23 || minute > 59 || second > 59) {
    return { display: text, year: "", yearMonth: "", isoDate: "" };
  }

  const yyyy = String(year).padStart(4, "0");
  const datePart = `${pad2(day)}.${pad2(month)}.${yyyy}`;
  const display = hour === 0 && minute === 0 ? datePart : `${datePart} ${pad2(hour)}:${pad2(minute)}`;

  return {
    display,
    year: yyyy,
    yearMonth: `${yyyy}-${pad2(month)}`,
    isoDate: `${yyyy}-${pad2(month)}-${pad2(day)}`
  };
}

/** YYYY-MM-DD -> DD.MM.YYYY */
export function formatIsoDate(isoDate: string): string {
  const [y, m, d] = isoDate.split("-");
  if (!y || !m || !d) return isoDate;
  return `${d}.${m}.${y}`;
}

export function parseNumeric(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;

  const cleaned = String(value)
    .replace(/[^0-9,.\-]/g, "")
    .replace(/,/g, ".");
  if (!cleaned) return null;
  // Number() is lenient about "" and whitespace but not about "1.2.3" or "--1"
  if (!/^-?(\d+\.?\d*|\.\d+)$/.test(cleaned)) return null;

  const n = Number(cleaned);
  return Number.isFinite(n) ? n : null;
}
