import type { AppConfig } from "./config.js";
import type { ExportConfig } from "./exportConfig.js";
import { createCsvStore } from "./adapters/store/csvStore.js";
import { createGoogleSheetsStore } from "./adapters/store/googleSheetsStore.js";
import { ReportSink } from "./adapters/store/sink.js";

export function sinkFromConfig(cfg: AppConfig, exportConfig: ExportConfig): ReportSink {
  if (cfg.REPORT_SINK === "sheets") {
    return createGoogleSheetsStore({
      spreadsheetId: cfg.GOOGLE_SHEETS_SPREADSHEET_ID ?? "",
      serviceAccountJsonPath: cfg.GOOGLE_SERVICE_ACCOUNT_JSON ?? ""
    });
  }
  return createCsvStore({ targetDir: exportConfig.targetBaseDir, maxVersions: cfg.MAX_REPORT_VERSIONS });
}
