import { AnnotatedReading, DeltaFields, Reading } from "../types.js";
import { daysBetween } from "../utils/time.js";

type EngineState =
  | { kind: "NO_PRIOR" }
  | { kind: "HAS_PRIOR"; value: number | null; date: string | null };

interface Step {
  fields: DeltaFields;
  next: EngineState;
}

const EMPTY: DeltaFields = {
  prevValue: null,
  prevDate: null,
  delta: null,
  deltaPerDay: null,
  days: null,
  resetDetected: false
};

/** A virtual meter whose combined value fell is treated as restarted. */
export function detectVirtualReset(
  meterKey: string,
  previous: number | null,
  current: number | null,
  virtualKeys: ReadonlySet<string>
): boolean {
  if (!virtualKeys.has(meterKey)) return false;
  if (previous === null || current === null) return false;
  return current < previous;
}

function step(
  state: EngineState,
  reading: Reading,
  virtualKeys: ReadonlySet<string>
): Step {
  const current = reading.value;
  const date = reading.isoDate || null;
  const next: EngineState = { kind: "HAS_PRIOR", value: current, date };

  if (state.kind === "NO_PRIOR") return { fields: EMPTY, next };

  const previous = state.value;
  if (current === null || previous === null) return { fields: EMPTY, next };

  const reset = virtualKeys.has(reading.meterKey)
    ? detectVirtualReset(reading.meterKey, previous, current, virtualKeys)
    : current < previous;
  if (reset) {
    return { fields: { ...EMPTY, delta: current, resetDetected: true }, next };
  }

  const delta = current - previous;
  const days = state.date && date ? daysBetween(state.date, date) : null;
  return {
    fields: {
      prevValue: previous,
      prevDate: state.date,
      delta,
      deltaPerDay: days !== null && days > 0 ? delta / days : null,
      days,
      resetDetected: false
    },
    next
  };
}

/** Chronological order; readings without a usable date go last, in input order. */
export function compareByDate(a: Reading, b: Reading): number {
  if (a.isoDate === b.isoDate) return 0;
  if (!a.isoDate) return 1;
  if (!b.isoDate) return -1;
  return a.isoDate < b.isoDate ? -1 : 1;
}

/**
 * Folds one meter's readings (already in chronological order) into annotated
 * readings. Every call starts from NO_PRIOR.
 */
export function annotateSequence<T extends Reading>(
  readings: readonly T[],
  virtualKeys: ReadonlySet<string> = new Set()
): Array<T & DeltaFields> {
  const out: Array<T & DeltaFields> = [];
  let state: EngineState = { kind: "NO_PRIOR" };
  for (const reading of readings) {
    const { fields, next } = step(state, reading, virtualKeys);
    out.push({ ...reading, ...fields });
    state = next;
  }
  return out;
}

export function groupByMeter<T extends Reading>(readings: readonly T[]): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const r of readings) {
    const group = groups.get(r.meterKey);
    if (group) group.push(r);
    else groups.set(r.meterKey, [r]);
  }
  return groups;
}

/**
 * Annotates readings of any number of meters. Output is grouped by meter key
 * (sorted) and chronological within each meter.
 */
export function annotateReadings(
  readings: readonly Reading[],
  virtualKeys: ReadonlySet<string> = new Set()
): AnnotatedReading[] {
  const groups = groupByMeter(readings);
  const keys = [...groups.keys()].sort();
  return keys.flatMap((key) => {
    const sorted = [...(groups.get(key) ?? [])].sort(compareByDate);
    return annotateSequence(sorted, virtualKeys).map((r): AnnotatedReading => ({
      ...r,
      remarks: [],
      normalized: false
    }));
  });
}
