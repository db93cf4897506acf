/**
 * Audit the playlists of a sources file against the files on disk
 * Run with: npm run audit -- [sources.json]
 *
 * Reports, per playlist:
 * 1. Titles with no matching file
 * 2. Titles that normalize to the same name
 * 3. Videos without a matching audio file
 */

import "dotenv/config";
import { collectionDestination, loadDownloaderSettings } from "../config/downloader.js";
import { loadSources } from "../config/sources.js";
import {
  auditPlaylistDuplicates,
  auditPlaylistFiles,
  findUnpairedVideos,
} from "../services/business/reconciliationService.js";
import { describeError } from "../utils/errorMessages.js";

async function auditPlaylists() {
  const sourcesPath = process.argv[2] ?? "./sources.json";

  try {
    const settings = loadDownloaderSettings();
    const sources = await loadSources(sourcesPath);

    if (sources.playlists.length === 0) {
      console.log("No playlists configured, nothing to audit");
      process.exit(0);
    }

    let problems = 0;

    for (const url of sources.playlists) {
      console.log(`\n=== ${url} ===`);
      try {
        const files = await auditPlaylistFiles(url, settings);
        const duplicates = await auditPlaylistDuplicates(url, settings);

        const destination = collectionDestination(settings, files.playlistTitle);
        const unpaired = await findUnpairedVideos(
          destination.videoDir,
          destination.audioDir,
          settings.video.ext,
          settings.audio.ext
        );
        for (const name of unpaired) {
          console.log(`[audit]   no audio for: ${name}`);
        }

        problems += files.missing.length + duplicates.duplicates.length + unpaired.length;
      } catch (error) {
        console.error(`✗ Could not audit ${url}: ${describeError(error)}`);
        problems++;
      }
    }

    console.log(problems === 0 ? "\n✓ All playlists match" : `\n✗ ${problems} issue(s) found`);
    process.exit(problems === 0 ? 0 : 1);
  } catch (error) {
    console.error("Error auditing playlists:", error);
    process.exit(1);
  }
}

void auditPlaylists();
