import { Reading, VirtualMapping } from "../types.js";

type OrderableRow = Pick<Reading, "meterKey" | "meterName">;

/**
 * Dotted sort key per meter: `<group>.0.0` for every top-level meter and
 * `<group>.0.<n>` for the n-th declared constituent of a virtual meter.
 * Constituents of a nested virtual meter extend its key by one segment.
 * A physical meter whose virtual parent is present is not a group of its own.
 */
export function assignSortKeys(rows: readonly OrderableRow[], mapping: VirtualMapping): Map<string, string> {
  const names = new Map<string, string>();
  rows.forEach((r) => {
    if (!names.has(r.meterKey)) names.set(r.meterKey, r.meterName);
  });

  const byName = (a: string, b: string) => {
    const na = names.get(a) ?? "";
    const nb = names.get(b) ?? "";
    if (na !== nb) return na < nb ? -1 : 1;
    return a < b ? -1 : a > b ? 1 : 0;
  };

  const hasPresentParent = (key: string) => {
    const parent = mapping.physicalToVirtual.get(key);
    return Boolean(parent && parent !== key && names.has(parent) && mapping.virtualToPhysical.has(parent));
  };

  const assign = (topLevel: readonly string[]) => {
    const keys = new Map<string, string>();

    const keyChildren = (parent: string, prefix: string) => {
      mapping.virtualToPhysical.get(parent)?.forEach((child, childIdx) => {
        if (!names.has(child) || keys.has(child)) return;
        if (mapping.physicalToVirtual.get(child) !== parent) return;
        const key = `${prefix}.${childIdx + 1}`;
        keys.set(child, key);
        keyChildren(child, key);
      });
    };

    let group = 0;
    [...topLevel].sort(byName).forEach((key) => {
      if (keys.has(key)) return;
      group += 1;
      keys.set(key, `${group}.0.0`);
      keyChildren(key, `${group}.0`);
    });
    return keys;
  };

  const topLevel = [...names.keys()].filter((key) => !hasPresentParent(key));
  const keys = assign(topLevel);

  // parents that only reach each other (a cycle) leave their members unkeyed
  const orphans = [...names.keys()].filter((key) => !keys.has(key));
  return orphans.length === 0 ? keys : assign([...topLevel, ...orphans]);
}

/** Compares dotted keys segment by segment as numbers. */
export function compareSortKeys(a: string, b: string): number {
  const pa = a.split(".").map(Number);
  const pb = b.split(".").map(Number);
  const len = Math.max(pa.length, pb.length);
  for (let i = 0; i < len; i++) {
    const diff = (pa[i] ?? -1) - (pb[i] ?? -1);
    if (diff !== 0) return diff;
  }
  return 0;
}

/** Stable: rows of one meter keep their incoming (chronological) order. */
export function orderRows<T extends OrderableRow>(rows: readonly T[], mapping: VirtualMapping): T[] {
  const keys = assignSortKeys(rows, mapping);
  return rows
    .map((row, idx) => ({ row, idx, key: keys.get(row.meterKey) ?? "" }))
    .sort((a, b) => compareSortKeys(a.key, b.key) || a.idx - b.idx)
    .map((entry) => entry.row);
}
