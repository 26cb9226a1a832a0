import { loadConfig } from "../src/config.js";
import { loadExportConfig } from "../src/exportConfig.js";
import { processFolder } from "../src/exporter.js";
import { sinkFromConfig } from "../src/sinkFromConfig.js";
import { logger } from "../src/utils/logger.js";

const folder = process.argv[2];
if (!folder) {
  logger.error("Usage: export-folder <folder>");
  process.exit(2);
}

const cfg = loadConfig();
const exportConfig = loadExportConfig(cfg.EXPORT_CONFIG_PATH);

const dataset = await processFolder(
  {
    exportConfig,
    sink: sinkFromConfig(cfg, exportConfig),
    imageMode: cfg.IMAGE_MODE,
    pruneImages: false
  },
  folder
);
logger.info({ folder, readings: dataset.readings.length }, "Exported one folder");
