import { ReportTable } from "../../types.js";

export interface ReportSink {
  readonly kind: string;
  /** Writes one report (readings, yearly, monthly, ...) under `name`; returns where it went. */
  writeReport(name: string, tables: readonly ReportTable[]): Promise<string>;
}
