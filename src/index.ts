#!/usr/bin/env node
import { loadConfig } from "./config.js";
import { loadExportConfig } from "./exportConfig.js";
import { runExport } from "./exporter.js";
import { sinkFromConfig } from "./sinkFromConfig.js";
import { logger } from "./utils/logger.js";

const cfg = loadConfig();
const exportConfig = loadExportConfig(process.argv[2] ?? cfg.EXPORT_CONFIG_PATH);

logger.info(
  {
    config: exportConfig.sourcePath,
    source: exportConfig.sourceBaseDir,
    target: exportConfig.targetBaseDir,
    folders: exportConfig.folders.length,
    sink: cfg.REPORT_SINK
  },
  "Starting meter export"
);

const summary = await runExport({
  exportConfig,
  sink: sinkFromConfig(cfg, exportConfig),
  imageMode: cfg.IMAGE_MODE,
  pruneImages: cfg.PRUNE_IMAGES
});

logger.info(summary, "Meter export finished");
if (summary.failed.length > 0) process.exitCode = 1;
