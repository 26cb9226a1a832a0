import assert from "node:assert/strict";
import { test } from "node:test";
import { parseConfig } from "./config.js";

test("defaults apply when nothing is set", () => {
  const cfg = parseConfig({});
  assert.equal(cfg.EXPORT_CONFIG_PATH, "./config/export.config.json");
  assert.equal(cfg.REPORT_SINK, "csv");
  assert.equal(cfg.MAX_REPORT_VERSIONS, 10);
  assert.equal(cfg.IMAGE_MODE, "copy");
  assert.equal(cfg.PRUNE_IMAGES, false);
});

test("flags and modes are read case-insensitively", () => {
  const cfg = parseConfig({ IMAGE_MODE: " Symlink ", PRUNE_IMAGES: "YES", MAX_REPORT_VERSIONS: "3" });
  assert.equal(cfg.IMAGE_MODE, "symlink");
  assert.equal(cfg.PRUNE_IMAGES, true);
  assert.equal(cfg.MAX_REPORT_VERSIONS, 3);
});

test("the sheets sink needs a spreadsheet and credentials", () => {
  assert.throws(
    () => parseConfig({ REPORT_SINK: "sheets", GOOGLE_SERVICE_ACCOUNT_JSON: "sa.json" }),
    { message: "Invalid environment configuration: GOOGLE_SHEETS_SPREADSHEET_ID: required when REPORT_SINK=sheets" }
  );
});
