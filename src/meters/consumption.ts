import { AnnotatedReading, ConsumptionRow } from "../types.js";
import { daysBetween, eachYear, endOfYear, startOfYear } from "../utils/time.js";

export type MeasuredRow = ConsumptionRow & { source: "measured" };

function measuredRows(rows: readonly AnnotatedReading[]): MeasuredRow[] {
  return rows
    .filter((r) => r.isoDate && r.value !== null)
    .map((r) => ({
      meterKey: r.meterKey,
      meterName: r.meterName,
      unit: r.unit,
      date: r.isoDate,
      reading: r.value ?? 0,
      days: r.days,
      consumption: r.delta,
      dailyRate: r.deltaPerDay,
      annualizedConsumption: r.deltaPerDay === null ? null : r.deltaPerDay * 365,
      source: "measured" as const
    }));
}

/**
 * Reading and daily rate at `target`: exact match, linear interpolation
 * between neighbours, or extrapolation from the nearest side.
 */
export function estimateAt(sorted: readonly MeasuredRow[], target: string): { reading: number; rate: number } | null {
  const exact = sorted.find((r) => r.date === target);
  if (exact) return { reading: exact.reading, rate: exact.dailyRate ?? 0 };

  const before = [...sorted].reverse().find((r) => r.date <= target);
  const after = sorted.find((r) => r.date >= target);

  if (before && after && before.date !== after.date) {
    const totalDays = daysBetween(before.date, after.date);
    if (totalDays > 0) {
      const frac = daysBetween(before.date, target) / totalDays;
      return {
        reading: before.reading + frac * (after.reading - before.reading),
        rate: after.dailyRate ?? (after.reading - before.reading) / totalDays
      };
    }
  }

  if (before) {
    const rate = before.dailyRate ?? 0;
    return { reading: before.reading + rate * daysBetween(before.date, target), rate };
  }

  if (after) {
    const rate = after.dailyRate ?? 0;
    return { reading: after.reading - rate * daysBetween(target, after.date), rate };
  }

  return null;
}

/**
 * Measured periods plus estimated readings on Jan 1 and Dec 31 of every year
 * the dataset spans.
 */
export function buildConsumption(rows: readonly AnnotatedReading[]): ConsumptionRow[] {
  const measured = measuredRows(rows);
  if (measured.length === 0) return [];

  const years = measured.map((r) => Number(r.date.slice(0, 4)));
  const firstYear = years.reduce((a, b) => Math.min(a, b), Infinity);
  const lastYear = years.reduce((a, b) => Math.max(a, b), -Infinity);

  const estimated: ConsumptionRow[] = [];
  groupByMeterKey(measured).forEach((sub) => {
    const sorted = [...sub].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
    const head = sorted[0];
    if (!head) return;
    for (const year of eachYear(firstYear, lastYear)) {
      for (const target of [startOfYear(year), endOfYear(year)]) {
        const est = estimateAt(sorted, target);
        if (!est) continue;
        estimated.push({
          meterKey: head.meterKey,
          meterName: head.meterName,
          unit: head.unit,
          date: target,
          reading: est.reading,
          days: null,
          consumption: null,
          dailyRate: est.rate,
          annualizedConsumption: est.rate * 365,
          source: "estimated"
        });
      }
    }
  });

  const sourceRank = (s: ConsumptionRow["source"]) => (s === "measured" ? 0 : 1);
  return [...measured, ...estimated].sort((a, b) => {
    if (a.meterKey !== b.meterKey) return a.meterKey < b.meterKey ? -1 : 1;
    if (a.date !== b.date) return a.date < b.date ? -1 : 1;
    return sourceRank(a.source) - sourceRank(b.source);
  });
}

function groupByMeterKey(rows: readonly MeasuredRow[]): Map<string, MeasuredRow[]> {
  const groups = new Map<string, MeasuredRow[]>();
  rows.forEach((r) => {
    const group = groups.get(r.meterKey);
    if (group) group.push(r);
    else groups.set(r.meterKey, [r]);
  });
  return groups;
}
