import { SnapshotRow, SummaryRow } from "../types.js";

export type UtilityKind = "water" | "heat" | "electricity";

const KIND_KEYWORDS: Array<{ kind: UtilityKind; keywords: string[] }> = [
  { kind: "water", keywords: ["wasser", "water"] },
  { kind: "heat", keywords: ["wärme", "waerme", "heat"] },
  { kind: "electricity", keywords: ["strom", "electric"] }
];

export function detectUtilityKind(typeTag: string, meterName: string): UtilityKind | null {
  const text = `${typeTag} ${meterName}`.toLowerCase();
  return KIND_KEYWORDS.find((entry) => entry.keywords.some((k) => text.includes(k)))?.kind ?? null;
}

/** Dwelling unit from a meter name: "DBMP.EG.Wasser-Küche" -> "DBMP.EG". */
export function extractDwellingUnit(meterName: string): string {
  const parts = meterName.split(".");
  return parts.length >= 2 ? parts.slice(0, 2).join(".") : (parts[0] ?? "");
}

function maxOf(current: number | null, next: number): number {
  return current === null ? next : Math.max(current, next);
}

export function buildMonthlySummary(rows: readonly SnapshotRow[]): SummaryRow[] {
  const byLabel = new Map<string, SummaryRow>();
  const unitByLabel = new Map<string, string>();

  for (const row of rows) {
    if (!row.isoDate) continue;
    const label = `${row.isoDate.slice(0, 4)}.${row.isoDate.slice(5, 7)}`;
    if (!unitByLabel.has(label)) unitByLabel.set(label, extractDwellingUnit(row.meterName));

    const kind = detectUtilityKind(row.typeTag, row.meterName);
    if (!kind || row.value === null) continue;

    const entry = byLabel.get(label) ?? { label, water: null, heat: null, electricity: null, unit: "" };
    entry[kind] = maxOf(entry[kind], row.value);
    byLabel.set(label, entry);
  }

  return [...byLabel.values()]
    .map((entry) => ({ ...entry, unit: unitByLabel.get(entry.label) ?? "" }))
    .sort((a, b) => (a.label < b.label ? -1 : a.label > b.label ? 1 : 0));
}
