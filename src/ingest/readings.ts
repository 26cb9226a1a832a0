import { Meter, Reading } from "../types.js";
import { parseDate, parseNumeric } from "../utils/parse.js";
import { ExportCounter, LocationExport } from "./locationExport.js";

export function buildRoomMap(data: LocationExport): Map<string, string> {
  const rooms = new Map<string, string>();
  for (const room of data.rooms) {
    const name = room.name || room.title;
    if (room.roomId && name) rooms.set(room.roomId, name);
  }
  return rooms;
}

function extractPrefix(name: string): string {
  for (const delim of [".", "-"]) {
    const idx = name.indexOf(delim);
    if (idx >= 0) return name.slice(0, idx);
  }
  return name;
}

/**
 * Room comes from the room table; the object is the room name's leading
 * segment, or the meter name's when the room is unknown.
 */
export function resolveRoomAndObject(
  counter: { roomId?: string | null; name: string },
  roomMap: ReadonlyMap<string, string>
): { room: string; object: string } {
  const room = counter.roomId ? (roomMap.get(counter.roomId) ?? "") : "";
  const name = counter.name.trim();
  if (room) return { room, object: extractPrefix(room) };
  return { room: "", object: name ? extractPrefix(name) : "" };
}

export function meterKeyOf(counter: ExportCounter): string {
  return counter.uuid || counter.counterId || "";
}

export function toMeter(counter: ExportCounter): Meter {
  const virtualData = counter.virtualCounterData;
  const add = virtualData?.counterUuidsToBeAdded ?? [];
  const subtract = virtualData?.counterUuidsToBeSubtracted ?? [];
  const master = virtualData?.masterCounterUuid ?? "";
  const isVirtual = (counter.counterType ?? "").toUpperCase() === "VIRTUAL";

  return {
    key: meterKeyOf(counter),
    name: counter.counterName ?? "",
    kind: isVirtual ? "VIRTUAL" : "PHYSICAL",
    typeTag: counter.counterType ?? "",
    unit: counter.counterUnit ?? "",
    roomId: counter.roomId ?? undefined,
    composition: master || add.length > 0 || subtract.length > 0 ? { master, add, subtract } : undefined
  };
}

export function toMeters(data: LocationExport): Meter[] {
  return data.counters.map(toMeter);
}

/** Measured readings of every non-virtual counter. */
export function toReadings(data: LocationExport): Reading[] {
  const roomMap = buildRoomMap(data);
  const readings: Reading[] = [];

  for (const counter of data.counters) {
    const meter = toMeter(counter);
    if (meter.kind === "VIRTUAL") continue;
    const { room, object } = resolveRoomAndObject({ roomId: counter.roomId, name: meter.name }, roomMap);

    for (const entry of counter.entries) {
      const date = parseDate(entry.date);
      const valueOrig = entry.value ?? null;
      readings.push({
        meterKey: meter.key,
        counterNumber: counter.counterId ?? "",
        meterName: meter.name,
        object,
        room,
        roomId: counter.roomId ?? "",
        kind: "PHYSICAL",
        typeTag: meter.typeTag,
        unit: meter.unit,
        dateOrig: entry.date ?? "",
        dateDisplay: date.display,
        year: date.year,
        yearMonth: date.yearMonth,
        isoDate: date.isoDate,
        valueOrig,
        value: parseNumeric(valueOrig),
        imageFileName: entry.localImageFileName ?? undefined
      });
    }
  }

  return readings;
}
