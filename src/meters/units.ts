import { AnnotatedReading } from "../types.js";

const VOLUMETRIC_UNITS = new Set(["qbm", "m3", "m³", "m^3"]);
export const VOLUME_SCALE = 1000;
export const VOLUME_REMARK = "volume divided by 1000";

export function isVolumetricUnit(unit: string | null | undefined): boolean {
  return VOLUMETRIC_UNITS.has(String(unit ?? "").trim().toLowerCase());
}

function scale(n: number | null): number | null {
  return n === null ? null : n / VOLUME_SCALE;
}

/**
 * Divides value, previous value and delta of volumetric meters by 1000 and
 * recomputes the per-day rate from the scaled delta. Rows already marked
 * normalized are returned untouched.
 */
export function normalizeUnits<T extends AnnotatedReading>(rows: readonly T[]): T[] {
  return rows.map((row) => {
    if (row.normalized) return row;
    if (!isVolumetricUnit(row.unit)) return { ...row, normalized: true };
    const delta = scale(row.delta);
    return {
      ...row,
      value: scale(row.value),
      prevValue: scale(row.prevValue),
      delta,
      deltaPerDay: delta !== null && row.days !== null && row.days > 0 ? delta / row.days : null,
      remarks: [...row.remarks, VOLUME_REMARK],
      normalized: true
    };
  });
}
