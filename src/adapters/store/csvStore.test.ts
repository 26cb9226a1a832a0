import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, test } from "node:test";
import { ReportTable } from "../../types.js";
import { cleanupOldReports, createCsvStore, toCsv } from "./csvStore.js";

let dir = "";

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "csv-store-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

const table: ReportTable = {
  name: "readings",
  header: ["Name", "Value"],
  rows: [
    ["x,y", 1],
    ['say "hi"', true]
  ]
};

test("cells with separators or quotes are quoted", () => {
  assert.equal(toCsv(table), 'Name,Value\n"x,y",1\n"say ""hi""",true\n');
});

test("each write adds a version, refreshes latest and keeps the newest versions", async () => {
  const stamps = [1, 2, 3].map((s) => new Date(2024, 0, 1, 0, 0, s));
  let i = 0;
  const store = createCsvStore({ targetDir: dir, maxVersions: 2, now: () => stamps[i++] ?? new Date(2024, 0, 2) });

  const locations: string[] = [];
  for (let n = 0; n < 3; n++) locations.push(await store.writeReport("H1", [table]));

  assert.deepEqual(locations, [
    path.join(dir, "##H1-20240101_000001"),
    path.join(dir, "##H1-20240101_000002"),
    path.join(dir, "##H1-20240101_000003")
  ]);
  assert.deepEqual((await fs.readdir(dir)).sort(), ["##H1-20240101_000002", "##H1-20240101_000003", "H1.latest"]);
  assert.equal(await fs.readFile(path.join(dir, "H1.latest", "readings.csv"), "utf-8"), toCsv(table));
});

test("cleanup only touches versions of the named report", async () => {
  for (const name of ["##A-1", "##A-2", "##A-3", "##AB-1", "A.latest"]) {
    await fs.mkdir(path.join(dir, name));
  }
  assert.deepEqual(await cleanupOldReports(dir, "A", 1), ["##A-1", "##A-2"]);
  assert.deepEqual((await fs.readdir(dir)).sort(), ["##A-3", "##AB-1", "A.latest"]);
});
