import assert from "node:assert/strict";
import { test } from "node:test";
import { reading } from "../testing/readings.js";
import { Meter } from "../types.js";
import {
  buildVirtualMapping,
  computeVirtualValue,
  inferVirtualUnit,
  mergeVirtualMappings,
  synthesizeVirtualReadings,
  toValueSeries,
  valueAtOrBefore
} from "./virtual.js";

function physical(key: string, name = key, unit = "kWh"): Meter {
  return { key, name, kind: "PHYSICAL", typeTag: "ELECTRICITY", unit };
}

function virtualMeter(key: string, master: string, add: string[], subtract: string[], unit = ""): Meter {
  return { key, name: key, kind: "VIRTUAL", typeTag: "VIRTUAL", unit, composition: { master, add, subtract } };
}

test("mapping lists add and subtract children and points each child at its parent", () => {
  const mapping = buildVirtualMapping([
    physical("a"),
    physical("b"),
    virtualMeter("v", "m", ["a"], ["b"])
  ]);
  assert.deepEqual([...mapping.virtualToPhysical.entries()], [["v", ["a", "b"]]]);
  assert.deepEqual([...mapping.physicalToVirtual.entries()], [
    ["a", "v"],
    ["b", "v"]
  ]);
});

test("a meter with empty composition lists is not mapped", () => {
  const mapping = buildVirtualMapping([virtualMeter("v", "m", [], [])]);
  assert.equal(mapping.virtualToPhysical.size, 0);
});

test("a physical meter claimed twice keeps the last virtual parent", () => {
  const mapping = buildVirtualMapping([virtualMeter("v1", "m", ["a"], []), virtualMeter("v2", "m", [], ["a"])]);
  assert.equal(mapping.physicalToVirtual.get("a"), "v2");
  assert.deepEqual(mapping.virtualToPhysical.get("v1"), ["a"]);
});

test("merged mappings keep entries from every dataset", () => {
  const merged = mergeVirtualMappings([
    buildVirtualMapping([virtualMeter("v1", "m", ["a"], [])]),
    buildVirtualMapping([virtualMeter("v2", "n", ["b"], [])])
  ]);
  assert.deepEqual([...merged.virtualToPhysical.keys()], ["v1", "v2"]);
  assert.equal(merged.physicalToVirtual.get("b"), "v2");
});

test("virtual value is master plus additions minus subtractions", () => {
  const series = toValueSeries([
    reading("m", "2023-06-01", 100),
    reading("a", "2023-06-01", 20),
    reading("b", "2023-06-01", 5)
  ]);
  assert.equal(computeVirtualValue(virtualMeter("v", "m", ["a"], ["b"]), "2023-06-01", series), 115);
});

test("constituents are taken at their latest value on or before the date, missing as zero", () => {
  const series = toValueSeries([
    reading("m", "2023-01-01", 100),
    reading("m", "2023-03-01", 130),
    reading("a", "2023-02-01", 20)
  ]);
  const v = virtualMeter("v", "m", ["a"], ["b"]);

  assert.equal(computeVirtualValue(v, "2023-01-15", series), 100);
  assert.equal(computeVirtualValue(v, "2023-02-15", series), 120);
  assert.equal(computeVirtualValue(v, "2023-03-01", series), 150);
});

test("no master value yet means no virtual value", () => {
  const series = toValueSeries([reading("m", "2023-02-01", 100), reading("a", "2023-01-01", 20)]);
  assert.equal(computeVirtualValue(virtualMeter("v", "m", ["a"], []), "2023-01-01", series), null);
  assert.equal(valueAtOrBefore(series.get("missing"), "2023-01-01"), null);
});

test("unit falls back to the master's unit, then to keywords in its name", () => {
  const v = virtualMeter("v", "m", ["a"], []);
  assert.equal(inferVirtualUnit({ ...v, unit: "MWh" }, physical("m")), "MWh");
  assert.equal(inferVirtualUnit(v, physical("m", "H1.Strom", "kWh")), "kWh");
  assert.equal(inferVirtualUnit(v, physical("m", "H1.Wasser-Kalt", "")), "m3");
  assert.equal(inferVirtualUnit(v, physical("m", "H1.Wärme", "")), "kWh");
  assert.equal(inferVirtualUnit(v, physical("m", "H1.Gas", "")), "unknown");
});

test("virtual readings are synthesized on every constituent date", () => {
  const meters = [physical("m", "Haus.Strom", ""), physical("a"), virtualMeter("v", "m", ["a"], [])];
  const readings = [
    reading("m", "2023-01-01", 100),
    reading("a", "2023-01-10", 5),
    reading("m", "2023-02-01", 140)
  ];

  const out = synthesizeVirtualReadings(meters, readings, {
    resolveRoomAndObject: () => ({ room: "", object: "" })
  });

  assert.deepEqual(
    out.map((r) => [r.isoDate, r.value, r.dateDisplay, r.kind, r.unit, r.room, r.object]),
    [
      ["2023-01-01", 100, "01.01.2023", "VIRTUAL", "kWh", "v", "v"],
      ["2023-01-10", 105, "10.01.2023", "VIRTUAL", "kWh", "v", "v"],
      ["2023-02-01", 145, "01.02.2023", "VIRTUAL", "kWh", "v", "v"]
    ]
  );
});

test("virtual meters with an unknown master are skipped", () => {
  const out = synthesizeVirtualReadings([virtualMeter("v", "ghost", ["a"], [])], [reading("a", "2023-01-01", 1)], {
    resolveRoomAndObject: () => ({ room: "R", object: "O" })
  });
  assert.deepEqual(out, []);
});
