import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { errorMessage } from "./utils/errors.js";

const ExportConfigSchema = z.object({
  source_base_dir: z.string().min(1),
  target_base_dir: z.string().min(1),
  folders: z.array(z.string().min(1)).min(1)
});

export interface ExportConfig {
  sourceBaseDir: string;
  targetBaseDir: string;
  folders: string[];
  sourcePath: string;
}

/** Relative directories resolve against the config file's own directory. */
export function loadExportConfig(configPath: string): ExportConfig {
  const resolvedPath = path.resolve(configPath);
  let raw: string;
  try {
    raw = fs.readFileSync(resolvedPath, "utf-8");
  } catch (e) {
    throw new Error(`Failed to read export config at ${resolvedPath}: ${errorMessage(e)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new Error(`Export config JSON parse error (${resolvedPath}): ${errorMessage(e)}`);
  }

  let validated: z.infer<typeof ExportConfigSchema>;
  try {
    validated = ExportConfigSchema.parse(parsed);
  } catch (e) {
    throw new Error(`Export config validation error (${resolvedPath}): ${errorMessage(e)}`);
  }

  const baseDir = path.dirname(resolvedPath);
  return {
    sourceBaseDir: path.resolve(baseDir, validated.source_base_dir),
    targetBaseDir: path.resolve(baseDir, validated.target_base_dir),
    folders: validated.folders,
    sourcePath: resolvedPath
  };
}
