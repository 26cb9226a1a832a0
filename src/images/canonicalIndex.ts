import fs from "node:fs/promises";
import path from "node:path";
import { isNotFound } from "../utils/errors.js";

/**
 * Index of the hidden image store. Three layouts are recognised:
 * flat `<obj>_<room>_<file>`, nested `<obj>/<room>/<file>` and a bare `<file>`.
 */
export interface CanonicalIndex {
  byTuple: Map<string, string>;
  byRoomFile: Map<string, string[]>;
  byFile: Map<string, string[]>;
}

const FLAT_NAME = /^(?<obj>[0-9a-f-]{8,})_(?<room>[0-9a-f-]{8,})_(?<file>.+)$/i;

export function tupleKey(objectId: string, roomId: string, file: string): string {
  return `${objectId}\u0000${roomId}\u0000${file}`;
}

export function roomFileKey(roomId: string, file: string): string {
  return `${roomId}\u0000${file}`;
}

function pushTo(map: Map<string, string[]>, key: string, value: string) {
  const list = map.get(key);
  if (list) list.push(value);
  else map.set(key, [value]);
}

async function walk(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const nested = await Promise.all(
    entries
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
      .map(async (entry) => {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) return walk(full);
        return entry.isFile() || entry.isSymbolicLink() ? [full] : [];
      })
  );
  return nested.flat();
}

export function emptyIndex(): CanonicalIndex {
  return { byTuple: new Map(), byRoomFile: new Map(), byFile: new Map() };
}

export async function buildCanonicalIndex(root: string): Promise<CanonicalIndex> {
  const idx = emptyIndex();
  try {
    const stat = await fs.stat(root);
    if (!stat.isDirectory()) return idx;
  } catch (e) {
    if (isNotFound(e)) return idx;
    throw e;
  }

  for (const file of await walk(root)) {
    const name = path.basename(file);
    const flat = FLAT_NAME.exec(name)?.groups;
    if (flat?.obj && flat.room && flat.file) {
      idx.byTuple.set(tupleKey(flat.obj, flat.room, flat.file), file);
      pushTo(idx.byRoomFile, roomFileKey(flat.room, flat.file), file);
      pushTo(idx.byFile, flat.file, file);
      continue;
    }

    const [objectId, roomId] = path.relative(root, path.dirname(file)).split(path.sep).filter(Boolean);
    if (objectId && roomId) {
      idx.byTuple.set(tupleKey(objectId, roomId, name), file);
      pushTo(idx.byRoomFile, roomFileKey(roomId, name), file);
    }
    pushTo(idx.byFile, name, file);
  }

  return idx;
}

/** Exact tuple, then room+file, then file name alone. */
export function lookupCanonical(
  idx: CanonicalIndex,
  objectId: string,
  roomId: string,
  file: string
): string | undefined {
  return (
    idx.byTuple.get(tupleKey(objectId, roomId, file)) ??
    idx.byRoomFile.get(roomFileKey(roomId, file))?.[0] ??
    idx.byFile.get(file)?.[0]
  );
}
