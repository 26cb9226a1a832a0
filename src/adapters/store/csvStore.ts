import fs from "node:fs/promises";
import path from "node:path";
import { CellValue, ReportTable } from "../../types.js";
import { logger } from "../../utils/logger.js";
import { safeName } from "../../utils/names.js";
import { fileTimestamp } from "../../utils/time.js";
import { ReportSink } from "./sink.js";

export interface CsvStoreConfig {
  targetDir: string;
  maxVersions: number;
  now?: () => Date;
}

export const REPORT_PREFIX = "##";
export const LATEST_SUFFIX = ".latest";

function escapeCell(value: CellValue): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(table: ReportTable): string {
  const lines = [table.header, ...table.rows].map((row) => row.map(escapeCell).join(","));
  return `${lines.join("\n")}\n`;
}

async function writeTables(dir: string, tables: readonly ReportTable[]): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
  for (const table of tables) {
    await fs.writeFile(path.join(dir, `${table.name}.csv`), toCsv(table), "utf-8");
  }
}

/** Removes the oldest timestamped reports for `name` beyond `maxVersions`. */
export async function cleanupOldReports(targetDir: string, name: string, maxVersions: number): Promise<string[]> {
  const prefix = `${REPORT_PREFIX}${name}-`;
  const entries = await fs.readdir(targetDir, { withFileTypes: true });
  const versions = entries
    .filter((e) => e.isDirectory() && e.name.startsWith(prefix))
    .map((e) => e.name)
    .sort();

  const removed: string[] = [];
  while (versions.length > maxVersions) {
    const oldest = versions.shift();
    if (!oldest) break;
    await fs.rm(path.join(targetDir, oldest), { recursive: true, force: true });
    removed.push(oldest);
    logger.info({ report: oldest }, "Removed old report");
  }
  return removed;
}

export function createCsvStore(cfg: CsvStoreConfig): ReportSink {
  const now = cfg.now ?? (() => new Date());
  return {
    kind: "csv",
    async writeReport(name, tables) {
      const base = safeName(name);
      const versionDir = path.join(cfg.targetDir, `${REPORT_PREFIX}${base}-${fileTimestamp(now())}`);
      await writeTables(versionDir, tables);

      const latestDir = path.join(cfg.targetDir, `${base}${LATEST_SUFFIX}`);
      await fs.rm(latestDir, { recursive: true, force: true });
      await writeTables(latestDir, tables);

      await cleanupOldReports(cfg.targetDir, base, cfg.maxVersions);
      logger.info({ report: path.basename(versionDir), tables: tables.map((t) => t.name) }, "Report saved");
      return versionDir;
    }
  };
}
