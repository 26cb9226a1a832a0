export type MeterKind = "PHYSICAL" | "VIRTUAL";

export interface MeterComposition {
  master: string;
  add: string[];
  subtract: string[];
}

export interface Meter {
  key: string;
  name: string;
  kind: MeterKind;
  typeTag: string;
  unit: string;
  roomId?: string;
  composition?: MeterComposition;
}

export interface Reading {
  meterKey: string;
  counterNumber: string;
  meterName: string;
  object: string;
  room: string;
  roomId: string;
  kind: MeterKind;
  typeTag: string;
  unit: string;
  dateOrig: string;
  dateDisplay: string;
  year: string;
  yearMonth: string;
  isoDate: string; // YYYY-MM-DD, "" when unparsable
  valueOrig: string | number | null;
  value: number | null;
  imageFileName?: string;
  imagePath?: string;
}

export interface DeltaFields {
  prevValue: number | null;
  prevDate: string | null;
  delta: number | null;
  deltaPerDay: number | null;
  days: number | null;
  resetDetected: boolean;
}

export interface AnnotatedReading extends Reading, DeltaFields {
  remarks: string[];
  normalized: boolean;
}

export type SnapshotSelection = "at_or_before" | "lookahead";

export interface SnapshotRow extends AnnotatedReading {
  period: string; // YYYY or YYYY-MM
  periodEnd: string;
  selection: SnapshotSelection;
}

export interface VirtualMapping {
  virtualToPhysical: Map<string, string[]>;
  physicalToVirtual: Map<string, string>;
}

export type ConsumptionSource = "measured" | "estimated";

export interface ConsumptionRow {
  meterKey: string;
  meterName: string;
  unit: string;
  date: string;
  reading: number;
  days: number | null;
  consumption: number | null;
  dailyRate: number | null;
  annualizedConsumption: number | null;
  source: ConsumptionSource;
}

export interface SummaryRow {
  label: string; // YYYY.MM
  water: number | null;
  heat: number | null;
  electricity: number | null;
  unit: string;
}

export type CellValue = string | number | boolean;

export interface ReportTable {
  name: string;
  header: string[];
  rows: CellValue[][];
}

export interface FolderDataset {
  folder: string;
  readings: AnnotatedReading[];
  rawReadings: Reading[];
  mapping: VirtualMapping;
}
