/**
 * Cleanup utility for staging files
 * Stale files are cleared at the start of a run; session files after each video.
 */

import fs from "fs";
import { readdir, rm } from "fs/promises";
import path from "path";

export interface CleanupResult {
  removedFiles: number;
  freedMB: number;
}

/**
 * Removes files in the staging directory older than maxAgeHours.
 * Partial downloads (.part, .ytdl) are removed regardless of age.
 */
export function cleanupStagingFiles(stagingDir: string, maxAgeHours: number = 24): CleanupResult {
  const result: CleanupResult = { removedFiles: 0, freedMB: 0 };

  if (!fs.existsSync(stagingDir)) {
    console.log("[cleanup] No staging directory found, nothing to clean");
    return result;
  }

  console.log(`[cleanup] Scanning ${stagingDir} for stale files...`);

  const now = Date.now();
  const maxAgeMs = maxAgeHours * 60 * 60 * 1000;

  try {
    for (const name of fs.readdirSync(stagingDir)) {
      const filePath = path.join(stagingDir, name);

      try {
        const stats = fs.statSync(filePath);
        if (!stats.isFile()) {
          continue;
        }

        const ageMs = now - stats.mtimeMs;
        const partial = name.endsWith(".part") || name.endsWith(".ytdl");

        if (partial || ageMs > maxAgeMs) {
          fs.unlinkSync(filePath);
          result.freedMB += stats.size / (1024 * 1024);
          result.removedFiles++;
          console.log(`[cleanup] Removed ${name} (${(ageMs / 3600000).toFixed(1)}h old)`);
        }
      } catch (err) {
        console.warn(`[cleanup] Failed to process ${name}:`, err);
      }
    }

    console.log(`[cleanup] ✓ Removed ${result.removedFiles} files, freed ${result.freedMB.toFixed(0)}MB`);
  } catch (error) {
    console.error("[cleanup] Error scanning staging directory:", error);
  }

  return result;
}

/**
 * Removes every staging file whose name carries the session token.
 * Never throws; failures are logged.
 */
export async function removeSessionFiles(stagingDir: string, sessionToken: string): Promise<number> {
  let names: string[];
  try {
    names = await readdir(stagingDir);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return 0;
    }
    console.warn(`[cleanup] Could not list ${stagingDir}:`, error);
    return 0;
  }

  let removed = 0;
  for (const name of names.filter((n) => n.includes(sessionToken))) {
    try {
      await rm(path.join(stagingDir, name), { force: true });
      removed++;
    } catch (error) {
      console.warn(`[cleanup] Failed to remove staging file ${name}:`, error);
    }
  }
  return removed;
}
