/**
 * Caption Service
 * Saves every caption track next to the video as `<final video name>.<code>.txt`.
 */

import { writeFile } from "fs/promises";
import path from "path";
import { fetchCaptionText, type CaptionTrack } from "../external/ytdlp.js";
import { fileExists } from "../../utils/files.js";
import { describeError } from "../../utils/errorMessages.js";

export interface CaptionExportResult {
  saved: string[];
  skipped: string[];
  failed: string[];
}

export function captionPath(videoDir: string, finalVideoName: string, code: string): string {
  return path.join(videoDir, `${finalVideoName}.${code}.txt`);
}

/**
 * Writes each track; a track that fails is logged and the rest continue.
 * Tracks already on disk are left alone.
 */
export async function exportCaptions(
  tracks: CaptionTrack[],
  videoDir: string,
  finalVideoName: string
): Promise<CaptionExportResult> {
  const result: CaptionExportResult = { saved: [], skipped: [], failed: [] };

  for (const track of tracks) {
    const target = captionPath(videoDir, finalVideoName, track.code);

    if (await fileExists(target)) {
      result.skipped.push(track.code);
      continue;
    }

    try {
      const text = await fetchCaptionText(track);
      await writeFile(target, text, "utf-8");
      result.saved.push(track.code);
      console.log(`[captions] ✓ ${track.code} → ${path.basename(target)}`);
    } catch (error) {
      result.failed.push(track.code);
      console.warn(`[captions] ✗ Failed to save ${track.code} for ${finalVideoName}: ${describeError(error)}`);
    }
  }

  return result;
}
