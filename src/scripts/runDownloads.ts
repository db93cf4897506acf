/**
 * Download everything listed in a sources file
 * Run with: npm run download -- [sources.json]
 *
 * Ctrl+C stops after the video currently in progress.
 */

import "dotenv/config";
import { loadDownloaderSettings } from "../config/downloader.js";
import { loadSources } from "../config/sources.js";
import { runSources } from "../jobs/orchestrators/batchOrchestrator.js";
import { cleanupStagingFiles } from "../utils/cleanupTemp.js";
import { AppError } from "../utils/errors.js";

async function runDownloads() {
  const sourcesPath = process.argv[2] ?? "./sources.json";
  const controller = new AbortController();

  const stop = (signal: string) => {
    if (controller.signal.aborted) {
      console.log(`\n${signal} received again, exiting now`);
      process.exit(130);
    }
    console.log(`\n${signal} received, finishing the current video then stopping...`);
    controller.abort();
  };
  process.on("SIGINT", () => stop("SIGINT"));
  process.on("SIGTERM", () => stop("SIGTERM"));

  try {
    const settings = loadDownloaderSettings();
    const sources = await loadSources(sourcesPath);

    console.log(`Sources: ${sourcesPath}`);
    console.log(`Video → ${settings.videoDir}`);
    console.log(`Audio → ${settings.audioDir}`);
    if (settings.dryRun) {
      console.log("Dry run: nothing will be downloaded or written");
    }

    cleanupStagingFiles(settings.stagingDir);

    const summary = await runSources(sources, { settings, signal: controller.signal });

    console.log("\n=== Summary ===");
    console.log(`Total:     ${summary.total}`);
    console.log(`Completed: ${summary.completed}`);
    console.log(`Skipped:   ${summary.skipped}`);
    console.log(`Failed:    ${summary.failed}`);
    console.log(`Cancelled: ${summary.cancelled}`);

    process.exit(summary.failed > 0 ? 1 : 0);
  } catch (error) {
    if (error instanceof AppError && !error.isOperational) {
      // bad configuration or sources file; the message says which
      console.error(`✗ ${error.message}`);
    } else {
      console.error("Error running downloads:", error);
    }
    process.exit(1);
  }
}

void runDownloads();
