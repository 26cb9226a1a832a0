const DAY_MS = 86_400_000;

/** Local wall-clock stamp for file names, e.g. 20240305_143000. */
export function fileTimestamp(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function toUtcMs(isoDate: string): number {
  const [y, m, d] = isoDate.split("-").map(Number);
  return Date.UTC(y ?? 0, (m ?? 1) - 1, d ?? 1);
}

function fromUtcMs(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

export function daysBetween(from: string, to: string): number {
  return Math.round((toUtcMs(to) - toUtcMs(from)) / DAY_MS);
}

export function addDays(isoDate: string, days: number): string {
  return fromUtcMs(toUtcMs(isoDate) + days * DAY_MS);
}

export function endOfYear(year: number): string {
  return `${String(year).padStart(4, "0")}-12-31`;
}

export function startOfYear(year: number): string {
  return `${String(year).padStart(4, "0")}-01-01`;
}

/** yearMonth is YYYY-MM */
export function endOfMonth(yearMonth: string): string {
  const [y, m] = yearMonth.split("-").map(Number);
  return fromUtcMs(Date.UTC(y ?? 0, m ?? 1, 0));
}

export function eachYear(first: number, last: number): number[] {
  const years: number[] = [];
  for (let y = first; y <= last; y++) years.push(y);
  return years;
}

export function eachMonth(first: string, last: string): string[] {
  const [fy, fm] = first.split("-").map(Number);
  const [ly, lm] = last.split("-").map(Number);
  const months: string[] = [];
  let y = fy ?? 0;
  let m = fm ?? 1;
  const endY = ly ?? 0;
  const endM = lm ?? 1;
  while (y < endY || (y === endY && m <= endM)) {
    months.push(`${String(y).padStart(4, "0")}-${String(m).padStart(2, "0")}`);
    m += 1;
    if (m > 12) {
      m = 1;
      y += 1;
    }
  }
  return months;
}
