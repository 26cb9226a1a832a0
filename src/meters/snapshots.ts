import { Reading, SnapshotRow, SnapshotSelection } from "../types.js";
import { addDays, eachMonth, eachYear, endOfMonth, endOfYear } from "../utils/time.js";
import { annotateSequence, compareByDate, groupByMeter } from "./delta.js";
import { normalizeUnits } from "./units.js";

export const YEARLY_LOOKAHEAD_DAYS = 15;
export const MONTHLY_LOOKAHEAD_DAYS = 10;

interface Period {
  label: string;
  end: string;
}

type Selected = Reading & { period: string; periodEnd: string; selection: SnapshotSelection };

/**
 * Last reading on or before `end`; failing that, the first one after `end`
 * within the look-ahead window.
 */
export function selectRepresentative(
  sorted: readonly Reading[],
  end: string,
  lookaheadDays: number
): { reading: Reading; selection: SnapshotSelection } | null {
  let before: Reading | undefined;
  for (const r of sorted) {
    if (r.isoDate > end) break;
    before = r;
  }
  if (before) return { reading: before, selection: "at_or_before" };

  const limit = addDays(end, lookaheadDays);
  const after = sorted.find((r) => r.isoDate > end && r.isoDate <= limit);
  return after ? { reading: after, selection: "lookahead" } : null;
}

function buildSnapshots(
  readings: readonly Reading[],
  virtualKeys: ReadonlySet<string>,
  periodsOf: (sorted: readonly Reading[]) => Period[],
  lookaheadDays: number
): SnapshotRow[] {
  const groups = groupByMeter(readings.filter((r) => r.isoDate));
  const keys = [...groups.keys()].sort();

  const rows = keys.flatMap((key) => {
    const sorted = [...(groups.get(key) ?? [])].sort(compareByDate);
    const selected: Selected[] = [];
    for (const period of periodsOf(sorted)) {
      const pick = selectRepresentative(sorted, period.end, lookaheadDays);
      if (!pick) continue;
      selected.push({ ...pick.reading, period: period.label, periodEnd: period.end, selection: pick.selection });
    }
    return annotateSequence(selected, virtualKeys).map((r): SnapshotRow => ({ ...r, remarks: [], normalized: false }));
  });

  return normalizeUnits(rows);
}

function yearPeriods(sorted: readonly Reading[]): Period[] {
  const first = sorted[0];
  const last = sorted[sorted.length - 1];
  if (!first || !last) return [];
  return eachYear(Number(first.isoDate.slice(0, 4)), Number(last.isoDate.slice(0, 4))).map((y) => ({
    label: String(y),
    end: endOfYear(y)
  }));
}

function monthPeriods(sorted: readonly Reading[]): Period[] {
  const first = sorted[0];
  const last = sorted[sorted.length - 1];
  if (!first || !last) return [];
  return eachMonth(first.isoDate.slice(0, 7), last.isoDate.slice(0, 7)).map((ym) => ({
    label: ym,
    end: endOfMonth(ym)
  }));
}

/** Takes raw (not yet normalized) readings. */
export function buildYearlySnapshots(
  readings: readonly Reading[],
  virtualKeys: ReadonlySet<string> = new Set()
): SnapshotRow[] {
  return buildSnapshots(readings, virtualKeys, yearPeriods, YEARLY_LOOKAHEAD_DAYS);
}

/** Takes raw (not yet normalized) readings. */
export function buildMonthlySnapshots(
  readings: readonly Reading[],
  virtualKeys: ReadonlySet<string> = new Set()
): SnapshotRow[] {
  return buildSnapshots(readings, virtualKeys, monthPeriods, MONTHLY_LOOKAHEAD_DAYS);
}
