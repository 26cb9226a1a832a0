import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, test } from "node:test";
import { buildCanonicalIndex } from "./canonicalIndex.js";
import { publishImage, publishedImagePath, pruneStaleImages } from "./publish.js";

let target = "";
let canonicalRoot = "";

beforeEach(async () => {
  target = await fs.mkdtemp(path.join(os.tmpdir(), "publish-"));
  canonicalRoot = path.join(target, ".aaaaaaaa");
  await fs.mkdir(canonicalRoot);
  await fs.writeFile(path.join(canonicalRoot, "aaaaaaaa_bbbbbbbb_p.jpg"), "photo");
});

afterEach(async () => {
  await fs.rm(target, { recursive: true, force: true });
});

async function params(meterName: string, mode: "copy" | "symlink", fileName = "p.jpg") {
  return {
    fileName,
    objectId: "aaaaaaaa",
    roomId: "bbbbbbbb",
    objectName: "H1",
    roomName: "H1.EG",
    meterName,
    isoDate: "2023-01-05",
    canonicalRoot,
    visibleRoot: target,
    index: await buildCanonicalIndex(canonicalRoot),
    mode
  };
}

test("published names carry meter and date", () => {
  assert.equal(
    publishedImagePath({
      fileName: "sub/p.jpg",
      objectId: "o",
      roomId: "r",
      objectName: "H1",
      roomName: "H1.EG",
      meterName: "",
      isoDate: "",
      visibleRoot: "out"
    }),
    path.join("out", "H1", "H1.EG", "unknown_nodate_p.jpg")
  );
});

test("copies the photo once and leaves an existing copy alone", async () => {
  const dest = await publishImage(await params("Wasser/Küche", "copy"));
  const expected = path.join(target, "H1", "H1.EG", "Wasser_Küche_20230105_p.jpg");
  assert.equal(dest, expected);
  assert.equal(await fs.readFile(expected, "utf-8"), "photo");

  await fs.writeFile(expected, "edited");
  assert.equal(await publishImage(await params("Wasser/Küche", "copy")), expected);
  assert.equal(await fs.readFile(expected, "utf-8"), "edited");
});

test("symlink mode links to the canonical file", async () => {
  const dest = await publishImage(await params("Strom", "symlink"));
  assert.equal(dest, path.join(target, "H1", "H1.EG", "Strom_20230105_p.jpg"));
  assert.equal((await fs.lstat(path.join(target, "H1", "H1.EG", "Strom_20230105_p.jpg"))).isSymbolicLink(), true);
});

test("a photo missing from the store is not published", async () => {
  assert.equal(await publishImage(await params("Strom", "copy", "absent.jpg")), null);
  assert.equal(await publishImage({ ...(await params("Strom", "copy")), fileName: undefined }), null);
});

test("pruning removes unpublished files below the top level only", async () => {
  const keep = path.join(target, "H1", "H1.EG", "keep.jpg");
  const stale = path.join(target, "H1", "H1.EG", "old.jpg");
  await fs.mkdir(path.dirname(keep), { recursive: true });
  await fs.writeFile(keep, "k");
  await fs.writeFile(stale, "s");
  await fs.mkdir(path.join(target, "##report-1"));
  await fs.writeFile(path.join(target, "##report-1", "readings.csv"), "x");
  await fs.writeFile(path.join(target, "top.txt"), "t");

  const removed = await pruneStaleImages(target, new Set([keep]), (name) => name.startsWith(".") || name.startsWith("##"));

  assert.equal(removed, 1);
  await assert.rejects(fs.access(stale));
  await fs.access(keep);
  await fs.access(path.join(target, "##report-1", "readings.csv"));
  await fs.access(path.join(target, "top.txt"));
  await fs.access(path.join(canonicalRoot, "aaaaaaaa_bbbbbbbb_p.jpg"));
});
