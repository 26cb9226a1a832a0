import { Meter, Reading, VirtualMapping } from "../types.js";
import { formatIsoDate } from "../utils/parse.js";
import { logger } from "../utils/logger.js";

export function buildVirtualMapping(meters: readonly Meter[]): VirtualMapping {
  const virtualToPhysical = new Map<string, string[]>();
  const physicalToVirtual = new Map<string, string>();

  for (const meter of meters) {
    const children = [...(meter.composition?.add ?? []), ...(meter.composition?.subtract ?? [])];
    if (children.length === 0) continue;

    virtualToPhysical.set(meter.key, children);
    for (const child of children) {
      const claimed = physicalToVirtual.get(child);
      if (claimed && claimed !== meter.key) {
        logger.warn(
          { physical: child, previous: claimed, current: meter.key },
          "Physical meter referenced by several virtual meters; last one wins"
        );
      }
      physicalToVirtual.set(child, meter.key);
    }
  }

  return { virtualToPhysical, physicalToVirtual };
}

export function mergeVirtualMappings(mappings: readonly VirtualMapping[]): VirtualMapping {
  const merged: VirtualMapping = { virtualToPhysical: new Map(), physicalToVirtual: new Map() };
  for (const m of mappings) {
    m.virtualToPhysical.forEach((children, key) => merged.virtualToPhysical.set(key, children));
    m.physicalToVirtual.forEach((parent, key) => merged.physicalToVirtual.set(key, parent));
  }
  return merged;
}

/** Dated numeric values of one meter, ascending by date. */
export type ValueSeries = Array<{ date: string; value: number }>;

export function toValueSeries(readings: readonly Reading[]): Map<string, ValueSeries> {
  const byKey = new Map<string, Map<string, number>>();
  for (const r of readings) {
    if (!r.isoDate || r.value === null) continue;
    const perDate = byKey.get(r.meterKey) ?? new Map<string, number>();
    // several readings on one day: the later entry counts
    perDate.set(r.isoDate, r.value);
    byKey.set(r.meterKey, perDate);
  }

  const out = new Map<string, ValueSeries>();
  byKey.forEach((perDate, key) => {
    const series = [...perDate.entries()]
      .map(([date, value]) => ({ date, value }))
      .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
    out.set(key, series);
  });
  return out;
}

export function valueAtOrBefore(series: ValueSeries | undefined, date: string): number | null {
  if (!series) return null;
  let found: number | null = null;
  for (const point of series) {
    if (point.date > date) break;
    found = point.value;
  }
  return found;
}

export function computeVirtualValue(
  meter: Meter,
  date: string,
  series: ReadonlyMap<string, ValueSeries>
): number | null {
  if (!meter.composition) return null;
  const base = valueAtOrBefore(series.get(meter.composition.master), date);
  if (base === null) return null;

  const sumOf = (keys: string[]) =>
    keys.reduce((acc, key) => acc + (valueAtOrBefore(series.get(key), date) ?? 0), 0);

  return base + sumOf(meter.composition.add) - sumOf(meter.composition.subtract);
}

const UNIT_KEYWORDS: Array<{ keywords: string[]; unit: string }> = [
  { keywords: ["wasser", "water"], unit: "m3" },
  { keywords: ["strom", "electric"], unit: "kWh" },
  { keywords: ["wärme", "waerme", "heat"], unit: "kWh" }
];

export function inferVirtualUnit(meter: Meter, master: Meter): string {
  if (meter.unit) return meter.unit;
  if (master.unit) return master.unit;
  const name = master.name.toLowerCase();
  const match = UNIT_KEYWORDS.find((entry) => entry.keywords.some((k) => name.includes(k)));
  return match?.unit ?? "unknown";
}

export interface VirtualContext {
  resolveRoomAndObject: (meter: Meter) => { room: string; object: string };
}

/**
 * One reading per distinct constituent date where the master has a value at
 * or before that date.
 */
export function synthesizeVirtualReadings(
  meters: readonly Meter[],
  readings: readonly Reading[],
  ctx: VirtualContext
): Reading[] {
  const byKey = new Map(meters.map((m) => [m.key, m]));
  const series = toValueSeries(readings);
  const out: Reading[] = [];

  for (const meter of meters) {
    if (meter.kind !== "VIRTUAL" || !meter.composition) continue;
    const master = byKey.get(meter.composition.master);
    if (!master) {
      logger.warn(
        { meter: meter.name, master: meter.composition.master },
        "Virtual meter references an unknown master meter; skipped"
      );
      continue;
    }

    const constituents = [meter.composition.master, ...meter.composition.add, ...meter.composition.subtract];
    const dates = new Set<string>();
    constituents.forEach((key) => series.get(key)?.forEach((p) => dates.add(p.date)));

    const unit = inferVirtualUnit(meter, master);
    const resolved = ctx.resolveRoomAndObject(meter);
    const room = resolved.room || meter.name || "Virtual";
    const object = resolved.object || room.split(".", 1)[0] || "";

    [...dates].sort().forEach((date) => {
      const value = computeVirtualValue(meter, date, series);
      if (value === null) return;
      out.push({
        meterKey: meter.key,
        counterNumber: "",
        meterName: meter.name,
        object,
        room,
        roomId: meter.roomId ?? "",
        kind: "VIRTUAL",
        typeTag: "VIRTUAL",
        unit,
        dateOrig: date,
        dateDisplay: formatIsoDate(date),
        year: date.slice(0, 4),
        yearMonth: date.slice(0, 7),
        isoDate: date,
        valueOrig: value,
        value
      });
    });
  }

  return out;
}
