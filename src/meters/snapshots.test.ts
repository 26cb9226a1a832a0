import assert from "node:assert/strict";
import { test } from "node:test";
import { reading } from "../testing/readings.js";
import {
  buildMonthlySnapshots,
  buildYearlySnapshots,
  MONTHLY_LOOKAHEAD_DAYS,
  selectRepresentative,
  YEARLY_LOOKAHEAD_DAYS
} from "./snapshots.js";

test("monthly snapshots pick the last reading of each month in the meter's range", () => {
  const rows = buildMonthlySnapshots([reading("m", "2023-06-01", 100), reading("m", "2023-07-20", 150)]);

  assert.deepEqual(
    rows.map((r) => [r.period, r.periodEnd, r.isoDate, r.selection, r.value, r.prevValue, r.delta, r.days]),
    [
      ["2023-06", "2023-06-30", "2023-06-01", "at_or_before", 100, null, null, null],
      ["2023-07", "2023-07-31", "2023-07-20", "at_or_before", 150, 100, 50, 49]
    ]
  );
  assert.equal(rows.some((r) => r.period === "2023-05"), false);
});

test("a reading shortly after the period end is used when nothing precedes it", () => {
  const sorted = [reading("m", "2024-01-10", 7)];
  assert.equal(selectRepresentative(sorted, "2023-12-31", YEARLY_LOOKAHEAD_DAYS)?.selection, "lookahead");
  assert.equal(selectRepresentative(sorted, "2023-12-31", YEARLY_LOOKAHEAD_DAYS)?.reading.isoDate, "2024-01-10");

  const monthly = [reading("m", "2023-06-10", 7)];
  assert.equal(selectRepresentative(monthly, "2023-05-31", MONTHLY_LOOKAHEAD_DAYS)?.selection, "lookahead");
  assert.equal(selectRepresentative([reading("m", "2023-06-11", 7)], "2023-05-31", MONTHLY_LOOKAHEAD_DAYS), null);
});

test("the latest reading on or before the end wins over later ones", () => {
  const sorted = [reading("m", "2023-12-01", 1), reading("m", "2023-12-31", 2), reading("m", "2024-01-02", 3)];
  const pick = selectRepresentative(sorted, "2023-12-31", YEARLY_LOOKAHEAD_DAYS);
  assert.equal(pick?.reading.value, 2);
  assert.equal(pick?.selection, "at_or_before");
});

test("yearly snapshots cover every year between first and last reading, normalized once", () => {
  const rows = buildYearlySnapshots([
    reading("w", "2021-03-01", 10, { unit: "m3" }),
    reading("w", "2021-12-20", 50, { unit: "m3" }),
    reading("w", "2023-02-01", 90, { unit: "m3" })
  ]);

  assert.deepEqual(
    rows.map((r) => [r.period, r.isoDate, r.value, r.prevValue, r.delta, r.days, r.resetDetected]),
    [
      ["2021", "2021-12-20", 0.05, null, null, null, false],
      ["2022", "2021-12-20", 0.05, 0.05, 0, 0, false],
      ["2023", "2023-02-01", 0.09, 0.05, 0.04, 408, false]
    ]
  );
  assert.equal(rows[1]?.deltaPerDay, null);
  assert.ok(rows.every((r) => r.normalized && r.remarks.length === 1));
});

test("snapshot deltas follow the snapshot sequence, including resets", () => {
  const rows = buildMonthlySnapshots([
    reading("m", "2023-01-05", 500),
    reading("m", "2023-01-25", 520),
    reading("m", "2023-02-10", 40),
    reading("m", "2023-03-15", 60)
  ]);

  assert.deepEqual(
    rows.map((r) => [r.period, r.value, r.delta, r.resetDetected, r.prevValue]),
    [
      ["2023-01", 520, null, false, null],
      ["2023-02", 40, 40, true, null],
      ["2023-03", 60, 20, false, 40]
    ]
  );
});

test("readings without a date do not produce snapshots", () => {
  assert.deepEqual(buildYearlySnapshots([reading("m", "unbekannt", 5)]), []);
});
