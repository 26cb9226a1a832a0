import path from "node:path";
import {
  AnnotatedReading,
  CellValue,
  ConsumptionRow,
  ReportTable,
  SnapshotRow,
  SummaryRow
} from "../types.js";

export interface TableOptions {
  createdAt: string;
  /** Image paths are written relative to this directory. */
  imageBase?: string;
}

export const READINGS_HEADER = [
  "Object",
  "Room",
  "CounterName",
  "Image",
  "CounterType",
  "CounterUnit",
  "CounterId",
  "RoomId",
  "Date_Orig",
  "Date_Year",
  "Date_YearMonth",
  "Date_Full",
  "Value_Orig",
  "Value_Num",
  "PrevValue",
  "PrevDate",
  "Delta",
  "DeltaPerDay",
  "Days",
  "ResetDetected",
  "Remarks",
  "CreatedAt"
];

const SNAPSHOT_TAIL = [
  "Date",
  "Selection",
  "Value_Num",
  "PrevValue",
  "PrevDate",
  "Delta",
  "DeltaPerDay",
  "Days",
  "ResetDetected",
  "Remarks",
  "CreatedAt"
];
const SNAPSHOT_HEAD = ["Object", "Room", "CounterName", "CounterId", "CounterType", "CounterUnit"];

export const YEARLY_HEADER = [...SNAPSHOT_HEAD, "Year", ...SNAPSHOT_TAIL];
export const MONTHLY_HEADER = [...SNAPSHOT_HEAD, "YearMonth", ...SNAPSHOT_TAIL];
export const SUMMARY_HEADER = ["Reading", "water", "heat", "electricity", "Unit"];
export const CONSUMPTION_HEADER = [
  "MeterId",
  "MeterName",
  "Unit",
  "Date",
  "Reading",
  "Days",
  "Consumption",
  "DailyRate",
  "AnnualizedConsumption",
  "Source"
];

function cell(v: string | number | boolean | null | undefined): CellValue {
  return v ?? "";
}

function remarks(row: AnnotatedReading): string {
  return row.remarks.map((r) => `${r}; `).join("");
}

function imageCell(row: AnnotatedReading, base?: string): string {
  if (!row.imagePath) return "";
  const rel = base ? path.relative(base, row.imagePath) : row.imagePath;
  return rel.split(path.sep).join("/");
}

export function readingsTable(rows: readonly AnnotatedReading[], opts: TableOptions): ReportTable {
  return {
    name: "readings",
    header: READINGS_HEADER,
    rows: rows.map((r) => [
      r.object,
      r.room,
      r.meterName,
      imageCell(r, opts.imageBase),
      r.typeTag,
      r.unit,
      r.counterNumber,
      r.roomId,
      r.dateDisplay,
      r.year,
      r.yearMonth,
      r.isoDate,
      cell(r.valueOrig),
      cell(r.value),
      cell(r.prevValue),
      cell(r.prevDate),
      cell(r.delta),
      cell(r.deltaPerDay),
      cell(r.days),
      r.resetDetected,
      remarks(r),
      opts.createdAt
    ])
  };
}

function snapshotCells(r: SnapshotRow, opts: TableOptions): CellValue[] {
  return [
    r.object,
    r.room,
    r.meterName,
    r.counterNumber,
    r.typeTag,
    r.unit,
    r.period,
    r.isoDate,
    r.selection,
    cell(r.value),
    cell(r.prevValue),
    cell(r.prevDate),
    cell(r.delta),
    cell(r.deltaPerDay),
    cell(r.days),
    r.resetDetected,
    remarks(r),
    opts.createdAt
  ];
}

export function yearlyTable(rows: readonly SnapshotRow[], opts: TableOptions): ReportTable {
  return { name: "yearly", header: YEARLY_HEADER, rows: rows.map((r) => snapshotCells(r, opts)) };
}

export function monthlyTable(rows: readonly SnapshotRow[], opts: TableOptions): ReportTable {
  return { name: "monthly", header: MONTHLY_HEADER, rows: rows.map((r) => snapshotCells(r, opts)) };
}

export function summaryTable(rows: readonly SummaryRow[]): ReportTable {
  return {
    name: "summary",
    header: SUMMARY_HEADER,
    rows: rows.map((r) => [r.label, cell(r.water), cell(r.heat), cell(r.electricity), r.unit])
  };
}

export function consumptionTable(rows: readonly ConsumptionRow[]): ReportTable {
  return {
    name: "consumption",
    header: CONSUMPTION_HEADER,
    rows: rows.map((r) => [
      r.meterKey,
      r.meterName,
      r.unit,
      r.date,
      r.reading,
      cell(r.days),
      cell(r.consumption),
      cell(r.dailyRate),
      cell(r.annualizedConsumption),
      r.source
    ])
  };
}
