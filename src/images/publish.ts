import fs from "node:fs/promises";
import path from "node:path";
import { isNotFound } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { safeName } from "../utils/names.js";
import { CanonicalIndex, lookupCanonical } from "./canonicalIndex.js";

export type ImageMode = "copy" | "symlink";

export interface PublishImageParams {
  fileName?: string;
  objectId: string;
  roomId: string;
  objectName: string;
  roomName: string;
  meterName: string;
  isoDate: string;
  canonicalRoot: string;
  visibleRoot: string;
  index: CanonicalIndex;
  mode: ImageMode;
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.lstat(p);
    return true;
  } catch (e) {
    if (isNotFound(e)) return false;
    throw e;
  }
}

export function publishedImagePath(params: Omit<PublishImageParams, "index" | "mode" | "canonicalRoot">): string | null {
  if (!params.fileName) return null;
  const file = path.basename(params.fileName);
  const meter = params.meterName ? safeName(params.meterName) : "unknown";
  const date = params.isoDate ? params.isoDate.replace(/-/g, "") : "nodate";
  return path.join(params.visibleRoot, safeName(params.objectName), safeName(params.roomName), `${meter}_${date}_${file}`);
}

/**
 * Copies (or links) a reading's photo from the hidden store into
 * `<visible>/<Object>/<Room>/<meter>_<YYYYMMDD>_<file>`. An existing
 * destination is left alone. Returns null when there is nothing to publish.
 */
export async function publishImage(params: PublishImageParams): Promise<string | null> {
  if (!params.fileName || !params.objectId || !params.roomId) return null;
  const file = path.basename(params.fileName);

  const source =
    lookupCanonical(params.index, params.objectId, params.roomId, file) ??
    path.join(params.canonicalRoot, `${params.objectId}_${params.roomId}_${file}`);

  if (!(await exists(source))) {
    logger.debug({ source }, "Image missing in canonical store");
    return null;
  }

  const dest = publishedImagePath(params);
  if (!dest) return null;
  if (await exists(dest)) return dest;

  await fs.mkdir(path.dirname(dest), { recursive: true });
  if (params.mode === "symlink") {
    await fs.symlink(source, dest);
  } else {
    await fs.copyFile(source, dest);
  }
  logger.debug({ source, dest, mode: params.mode }, "Image published");
  return dest;
}

/**
 * Deletes files under the visible tree that this run did not publish.
 * Top-level entries named in `ignore` (the hidden store, report outputs) are
 * not entered.
 */
export async function pruneStaleImages(
  visibleRoot: string,
  keep: ReadonlySet<string>,
  ignore: (topLevelName: string) => boolean
): Promise<number> {
  const keepResolved = new Set([...keep].map((p) => path.resolve(p)));
  let removed = 0;

  async function visit(dir: string, depth: number): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      if (depth === 0 && ignore(entry.name)) continue;
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await visit(full, depth + 1);
      } else if (depth > 0 && !keepResolved.has(path.resolve(full))) {
        await fs.unlink(full);
        removed += 1;
        logger.debug({ file: full }, "Removed stale image");
      }
    }
  }

  if (await exists(visibleRoot)) await visit(visibleRoot, 0);
  return removed;
}
