import fs from "node:fs/promises";
import path from "node:path";
import { ExportConfig } from "./exportConfig.js";
import { LATEST_SUFFIX, REPORT_PREFIX } from "./adapters/store/csvStore.js";
import { ReportSink } from "./adapters/store/sink.js";
import { buildCanonicalIndex } from "./images/canonicalIndex.js";
import { ImageMode, pruneStaleImages, publishImage } from "./images/publish.js";
import { loadLocationExport } from "./ingest/locationExport.js";
import { buildRoomMap, resolveRoomAndObject, toMeters, toReadings } from "./ingest/readings.js";
import { buildConsumption } from "./meters/consumption.js";
import { annotateReadings } from "./meters/delta.js";
import { orderRows } from "./meters/ordering.js";
import { buildMonthlySnapshots, buildYearlySnapshots } from "./meters/snapshots.js";
import { normalizeUnits } from "./meters/units.js";
import { buildVirtualMapping, mergeVirtualMappings, synthesizeVirtualReadings } from "./meters/virtual.js";
import { buildMonthlySummary } from "./report/summary.js";
import {
  consumptionTable,
  monthlyTable,
  readingsTable,
  summaryTable,
  yearlyTable
} from "./report/tables.js";
import {
  AnnotatedReading,
  ConsumptionRow,
  FolderDataset,
  Reading,
  ReportTable,
  SnapshotRow,
  SummaryRow,
  VirtualMapping
} from "./types.js";
import { errorMessage, isNotFound } from "./utils/errors.js";
import { logger } from "./utils/logger.js";

export const COMBINED_REPORT = "combined";

export interface ExportContext {
  exportConfig: ExportConfig;
  sink: ReportSink;
  imageMode: ImageMode;
  pruneImages: boolean;
  now?: () => Date;
}

export interface Report {
  readings: AnnotatedReading[];
  yearly: SnapshotRow[];
  monthly: SnapshotRow[];
  summary: SummaryRow[];
  consumption: ConsumptionRow[];
  tables: ReportTable[];
}

export interface ExportSummary {
  processed: string[];
  failed: string[];
  skipped: string[];
  combined: boolean;
}

function virtualKeysOf(readings: readonly Reading[], mapping: VirtualMapping): Set<string> {
  const keys = new Set(mapping.virtualToPhysical.keys());
  readings.forEach((r) => {
    if (r.kind === "VIRTUAL") keys.add(r.meterKey);
  });
  return keys;
}

/**
 * Raw, yearly and monthly views of one dataset. Each view runs the delta
 * engine on its own sequence and is unit-normalized once.
 */
export function buildReport(
  readings: readonly Reading[],
  mapping: VirtualMapping,
  opts: { createdAt: string; imageBase?: string }
): Report {
  const virtualKeys = virtualKeysOf(readings, mapping);

  const annotated = orderRows(normalizeUnits(annotateReadings(readings, virtualKeys)), mapping);
  const yearly = orderRows(buildYearlySnapshots(readings, virtualKeys), mapping);
  const monthly = orderRows(buildMonthlySnapshots(readings, virtualKeys), mapping);
  const summary = buildMonthlySummary(monthly);
  const consumption = buildConsumption(annotated);

  return {
    readings: annotated,
    yearly,
    monthly,
    summary,
    consumption,
    tables: [
      readingsTable(annotated, opts),
      yearlyTable(yearly, opts),
      monthlyTable(monthly, opts),
      summaryTable(summary),
      consumptionTable(consumption)
    ]
  };
}

function logDateRange(folder: string, readings: readonly Reading[]) {
  const dates = readings.map((r) => r.isoDate).filter(Boolean).sort();
  if (dates.length === 0) return;
  logger.info({ folder, oldest: dates[0], newest: dates[dates.length - 1] }, "Entry date range");
}

function logMeterOverview(folder: string, readings: readonly AnnotatedReading[]) {
  const overview = new Map<string, { room: string; meter: string; count: number; last: string }>();
  readings.forEach((r) => {
    const key = `${r.room}\u0000${r.meterName}`;
    const entry = overview.get(key) ?? { room: r.room, meter: r.meterName, count: 0, last: "" };
    entry.count += 1;
    if (r.isoDate && r.isoDate > entry.last) entry.last = r.isoDate;
    overview.set(key, entry);
  });
  [...overview.values()]
    .sort((a, b) => a.room.localeCompare(b.room) || a.meter.localeCompare(b.meter))
    .forEach((e) => logger.info({ folder, room: e.room, meter: e.meter, entries: e.count, last: e.last || "-" }, "Meter overview"));
}

async function attachImages(
  ctx: ExportContext,
  objectId: string,
  readings: readonly Reading[],
  published: Set<string>
): Promise<Reading[]> {
  const targetDir = ctx.exportConfig.targetBaseDir;
  const canonicalRoot = path.join(targetDir, `.${objectId}`);
  const index = await buildCanonicalIndex(canonicalRoot);
  logger.debug(
    { canonicalRoot, tuples: index.byTuple.size, byRoom: index.byRoomFile.size, byFile: index.byFile.size },
    "Canonical image store indexed"
  );

  const out: Reading[] = [];
  for (const reading of readings) {
    if (!reading.imageFileName) {
      out.push(reading);
      continue;
    }
    try {
      const dest = await publishImage({
        fileName: reading.imageFileName,
        objectId,
        roomId: reading.roomId,
        objectName: reading.object,
        roomName: reading.room,
        meterName: reading.meterName,
        isoDate: reading.isoDate,
        canonicalRoot,
        visibleRoot: targetDir,
        index,
        mode: ctx.imageMode
      });
      if (dest) published.add(dest);
      out.push(dest ? { ...reading, imagePath: dest } : reading);
    } catch (e) {
      logger.warn({ err: e, file: reading.imageFileName, meter: reading.meterName }, "Image could not be published");
      out.push(reading);
    }
  }
  return out;
}

export async function processFolder(
  ctx: ExportContext,
  folder: string,
  published: Set<string> = new Set()
): Promise<FolderDataset> {
  const folderPath = path.join(ctx.exportConfig.sourceBaseDir, folder);
  logger.info({ folder, folderPath }, "Processing folder");

  const data = await loadLocationExport(folderPath);
  const measured = toReadings(data);
  logDateRange(folder, measured);

  const meters = toMeters(data);
  const mapping = buildVirtualMapping(meters);
  const roomMap = buildRoomMap(data);

  const withImages = await attachImages(ctx, data.objectId, measured, published);
  const virtual = synthesizeVirtualReadings(meters, measured, {
    resolveRoomAndObject: (meter) => resolveRoomAndObject({ roomId: meter.roomId, name: meter.name }, roomMap)
  });
  const readings = [...withImages, ...virtual];

  const createdAt = (ctx.now ?? (() => new Date()))().toISOString();
  const report = buildReport(readings, mapping, { createdAt, imageBase: ctx.exportConfig.targetBaseDir });
  const location = await ctx.sink.writeReport(folder, report.tables);

  logMeterOverview(folder, report.readings);
  logger.info(
    { folder, location, readings: report.readings.length, yearly: report.yearly.length, monthly: report.monthly.length },
    "Folder exported"
  );

  return { folder, readings: report.readings, rawReadings: readings, mapping };
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch (e) {
    if (isNotFound(e)) return false;
    throw e;
  }
}

function isReportOrStore(name: string): boolean {
  return name.startsWith(".") || name.startsWith(REPORT_PREFIX) || name.endsWith(LATEST_SUFFIX);
}

/**
 * Exports every configured folder, then a combined report over all folders
 * that succeeded. A failing folder is logged and does not stop the run.
 */
export async function runExport(ctx: ExportContext): Promise<ExportSummary> {
  const summary: ExportSummary = { processed: [], failed: [], skipped: [], combined: false };
  const datasets: FolderDataset[] = [];
  const published = new Set<string>();

  await fs.mkdir(ctx.exportConfig.targetBaseDir, { recursive: true });

  for (const folder of ctx.exportConfig.folders) {
    const folderPath = path.join(ctx.exportConfig.sourceBaseDir, folder);
    if (!(await isDirectory(folderPath))) {
      logger.warn({ folder, folderPath }, "Folder missing; skipped");
      summary.skipped.push(folder);
      continue;
    }
    try {
      datasets.push(await processFolder(ctx, folder, published));
      summary.processed.push(folder);
    } catch (e) {
      logger.error({ err: e, folder }, `Folder export failed: ${errorMessage(e)}`);
      summary.failed.push(folder);
    }
  }

  if (datasets.length > 0) {
    const readings = datasets.flatMap((d) => d.rawReadings);
    const mapping = mergeVirtualMappings(datasets.map((d) => d.mapping));
    const createdAt = (ctx.now ?? (() => new Date()))().toISOString();
    const report = buildReport(readings, mapping, { createdAt, imageBase: ctx.exportConfig.targetBaseDir });
    await ctx.sink.writeReport(COMBINED_REPORT, report.tables);
    summary.combined = true;
  }

  if (ctx.pruneImages && summary.failed.length === 0 && summary.skipped.length === 0) {
    const removed = await pruneStaleImages(ctx.exportConfig.targetBaseDir, published, isReportOrStore);
    logger.info({ removed }, "Stale images pruned");
  }

  return summary;
}
