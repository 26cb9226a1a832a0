import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { errorMessage } from "../utils/errors.js";

export class LocationExportError extends Error {
  constructor(
    message: string,
    readonly sourcePath: string
  ) {
    super(message);
    this.name = "LocationExportError";
  }
}

const idLike = z.union([z.string(), z.number()]).transform((v) => String(v));

// Descriptive fields and entry payloads degrade instead of failing the export.
const looseText = z
  .unknown()
  .transform((v) => (typeof v === "string" ? v : typeof v === "number" || typeof v === "boolean" ? String(v) : null));

const looseValue = z
  .unknown()
  .transform((v) => (typeof v === "string" || typeof v === "number" ? v : typeof v === "boolean" ? String(v) : null));

const EntrySchema = z
  .object({
    date: looseText,
    value: looseValue,
    localImageFileName: looseText
  })
  .passthrough();

const EntriesSchema = z
  .union([z.array(EntrySchema), z.object({ entries: z.array(EntrySchema).nullish() }).passthrough()])
  .nullish()
  .transform((v) => (Array.isArray(v) ? v : (v?.entries ?? [])));

const VirtualCounterDataSchema = z
  .object({
    masterCounterUuid: z.string().nullish(),
    counterUuidsToBeAdded: z.array(z.string()).nullish(),
    counterUuidsToBeSubtracted: z.array(z.string()).nullish()
  })
  .passthrough();

const CounterSchema = z
  .object({
    uuid: idLike.nullish(),
    counterId: idLike.nullish(),
    counterName: looseText,
    counterType: looseText,
    counterUnit: looseText,
    roomId: looseText,
    virtualCounterData: VirtualCounterDataSchema.nullish(),
    entries: EntriesSchema
  })
  .passthrough()
  .refine((c) => Boolean(c.uuid || c.counterId), { message: "counter needs a uuid or counterId" });

const RoomSchema = z
  .object({
    roomId: looseText,
    name: looseText,
    title: looseText
  })
  .passthrough();

export const LocationExportSchema = z
  .object({
    objectId: idLike,
    rooms: z.array(RoomSchema),
    counters: z.array(CounterSchema)
  })
  .passthrough();

export type LocationExport = z.infer<typeof LocationExportSchema>;
export type ExportCounter = LocationExport["counters"][number];
export type ExportEntry = ExportCounter["entries"][number];

export function exportJsonPath(folderPath: string): string {
  return path.join(folderPath, `${path.basename(folderPath)}.json`);
}

export function parseLocationExport(raw: unknown, sourcePath: string): LocationExport {
  const parsed = LocationExportSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new LocationExportError(`Location export is malformed (${sourcePath}): ${issues}`, sourcePath);
  }
  return parsed.data;
}

/** Reads `<folder>/<folder>.json`. */
export async function loadLocationExport(folderPath: string): Promise<LocationExport> {
  const jsonPath = exportJsonPath(folderPath);

  let raw: string;
  try {
    raw = await fs.readFile(jsonPath, "utf-8");
  } catch (e) {
    throw new LocationExportError(`Failed to read location export at ${jsonPath}: ${errorMessage(e)}`, jsonPath);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new LocationExportError(`Location export JSON parse error (${jsonPath}): ${errorMessage(e)}`, jsonPath);
  }

  return parseLocationExport(parsed, jsonPath);
}
