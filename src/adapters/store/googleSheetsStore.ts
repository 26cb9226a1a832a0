import { google, sheets_v4 } from "googleapis";
import fs from "node:fs/promises";
import { z } from "zod";
import { CellValue, ReportTable } from "../../types.js";
import { logger } from "../../utils/logger.js";
import { safeSheetName } from "../../utils/names.js";
import { ReportSink } from "./sink.js";

export interface SheetsStoreConfig {
  spreadsheetId: string;
  serviceAccountJsonPath: string;
}

/** The handful of Sheets calls the store makes. */
export interface SheetsApi {
  listSheetTitles(spreadsheetId: string): Promise<string[]>;
  addSheet(spreadsheetId: string, title: string): Promise<void>;
  clear(spreadsheetId: string, range: string): Promise<void>;
  update(spreadsheetId: string, range: string, values: (string | number)[][]): Promise<void>;
}

const ServiceAccountSchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1)
});

function wrapSheets(sheets: sheets_v4.Sheets): SheetsApi {
  return {
    async listSheetTitles(spreadsheetId) {
      const spreadsheet = await sheets.spreadsheets.get({ spreadsheetId, fields: "sheets.properties.title" });
      return (spreadsheet.data.sheets ?? [])
        .map((s) => s.properties?.title ?? "")
        .filter((title) => title.length > 0);
    },
    async addSheet(spreadsheetId, title) {
      await sheets.spreadsheets.batchUpdate({
        spreadsheetId,
        requestBody: { requests: [{ addSheet: { properties: { title } } }] }
      });
    },
    async clear(spreadsheetId, range) {
      await sheets.spreadsheets.values.clear({ spreadsheetId, range });
    },
    async update(spreadsheetId, range, values) {
      await sheets.spreadsheets.values.update({
        spreadsheetId,
        range,
        valueInputOption: "USER_ENTERED",
        requestBody: { values }
      });
    }
  };
}

export async function getSheetsClient(serviceAccountJsonPath: string): Promise<SheetsApi> {
  const raw = await fs.readFile(serviceAccountJsonPath, "utf-8");
  const creds = ServiceAccountSchema.parse(JSON.parse(raw));

  const auth = new google.auth.JWT({
    email: creds.client_email,
    key: creds.private_key,
    scopes: ["https://www.googleapis.com/auth/spreadsheets"]
  });

  return wrapSheets(google.sheets({ version: "v4", auth }));
}

export function sheetTitle(reportName: string, tableName: string): string {
  return safeSheetName(`${reportName} ${tableName}`);
}

function a1(title: string, cells: string): string {
  return `'${title.replace(/'/g, "''")}'!${cells}`;
}

export function normalizeRowValues(row: readonly CellValue[]): (string | number)[] {
  return row.map((v) => (typeof v === "boolean" ? String(v) : v));
}

async function ensureSheetExists(api: SheetsApi, spreadsheetId: string, title: string, known: Set<string>) {
  if (known.has(title)) return;
  const titles = await api.listSheetTitles(spreadsheetId);
  titles.forEach((t) => known.add(t));
  if (!known.has(title)) {
    await api.addSheet(spreadsheetId, title);
    known.add(title);
  }
}

export async function overwriteSheet(
  api: SheetsApi,
  spreadsheetId: string,
  title: string,
  rows: readonly (readonly CellValue[])[]
): Promise<void> {
  await api.clear(spreadsheetId, a1(title, "A:ZZ"));
  if (rows.length === 0) return;
  await api.update(
    spreadsheetId,
    a1(title, "A1"),
    rows.map((row) => normalizeRowValues(row))
  );
}

/** One tab per table, named "<report> <table>", cleared and rewritten. */
export function createGoogleSheetsStore(cfg: SheetsStoreConfig, client?: SheetsApi): ReportSink {
  const known = new Set<string>();
  let api: SheetsApi | undefined = client;

  return {
    kind: "sheets",
    async writeReport(name, tables: readonly ReportTable[]) {
      api = api ?? (await getSheetsClient(cfg.serviceAccountJsonPath));
      for (const table of tables) {
        const title = sheetTitle(name, table.name);
        await ensureSheetExists(api, cfg.spreadsheetId, title, known);
        await overwriteSheet(api, cfg.spreadsheetId, title, [table.header, ...table.rows]);
      }
      logger.info({ report: name, spreadsheetId: cfg.spreadsheetId, tables: tables.length }, "Report written to sheets");
      return `sheets:${cfg.spreadsheetId}`;
    }
  };
}
