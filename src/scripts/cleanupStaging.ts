/**
 * Remove stale files from the staging directory
 * Run with: npm run cleanup -- [maxAgeHours]
 */

import "dotenv/config";
import { loadDownloaderSettings } from "../config/downloader.js";
import { cleanupStagingFiles } from "../utils/cleanupTemp.js";

function cleanupStaging() {
  const maxAgeHours = Number(process.argv[2] ?? 24);
  if (!Number.isFinite(maxAgeHours) || maxAgeHours < 0) {
    console.error(`Invalid maxAgeHours: ${process.argv[2]}`);
    process.exit(1);
  }

  try {
    const settings = loadDownloaderSettings();
    cleanupStagingFiles(settings.stagingDir, maxAgeHours);
  } catch (error) {
    console.error("Error cleaning staging directory:", error);
    process.exit(1);
  }

  process.exit(0);
}

cleanupStaging();
