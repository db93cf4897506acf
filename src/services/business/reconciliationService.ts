/**
 * Reconciliation Service
 * Read-only audits comparing playlists, files on disk and stored tasks.
 * Nothing here writes to disk or to the task table.
 */

import { collectionDestination, type DownloaderSettings } from "../../config/downloader.js";
import type { DownloadTask } from "../../repositories/taskRepository.js";
import { fetchPlaylist } from "../external/ytdlp.js";
import { normalizeTitle } from "../../utils/filename.js";
import { listBasenames } from "../../utils/files.js";

export interface MissingTitle {
  title: string;
  normalized: string;
}

export interface PlaylistFileAudit {
  playlistTitle: string;
  videoDir: string;
  audioDir: string;
  expected: number;
  videoFiles: number;
  audioFiles: number;
  missing: MissingTitle[];
}

export interface PlaylistDuplicateAudit {
  playlistTitle: string;
  duplicates: string[];
}

export type HashKind = "video" | "audio";

export interface DuplicateContent {
  kind: HashKind;
  hash: string;
  externalIds: string[];
}

/**
 * Titles whose normalized form is absent from the larger of the two
 * normalized on-disk sets (video basenames or audio basenames).
 */
export function findMissingTitles(
  titles: string[],
  videoBasenames: string[],
  audioBasenames: string[],
  maxLength: number
): MissingTitle[] {
  const videoSet = new Set(videoBasenames.map((name) => normalizeTitle(name, maxLength)));
  const audioSet = new Set(audioBasenames.map((name) => normalizeTitle(name, maxLength)));
  const onDisk = videoSet.size >= audioSet.size ? videoSet : audioSet;

  const missing: MissingTitle[] = [];
  for (const title of titles) {
    const normalized = normalizeTitle(title, maxLength);
    if (!onDisk.has(normalized)) {
      missing.push({ title, normalized });
    }
  }
  return missing;
}

/**
 * Every title whose normalized form already appeared earlier in the list.
 */
export function findDuplicateTitles(titles: string[], maxLength: number): string[] {
  const seen = new Set<string>();
  const duplicates: string[] = [];

  for (const title of titles) {
    const normalized = normalizeTitle(title, maxLength);
    if (seen.has(normalized)) {
      duplicates.push(title);
    } else {
      seen.add(normalized);
    }
  }
  return duplicates;
}

/**
 * Video base names with no audio file of the same base name.
 */
export async function findUnpairedVideos(
  videoDir: string,
  audioDir: string,
  videoExt: string,
  audioExt: string
): Promise<string[]> {
  const videos = await listBasenames(videoDir, videoExt);
  const audio = new Set(await listBasenames(audioDir, audioExt));
  return videos.filter((name) => !audio.has(name));
}

/**
 * Completed tasks sharing a content digest.
 */
export function findDuplicateContent(tasks: DownloadTask[]): DuplicateContent[] {
  const groups = new Map<string, DuplicateContent>();

  const add = (kind: HashKind, hash: string | null, externalId: string) => {
    if (!hash) return;
    const key = `${kind}:${hash}`;
    const group = groups.get(key) ?? { kind, hash, externalIds: [] };
    group.externalIds.push(externalId);
    groups.set(key, group);
  };

  for (const task of tasks) {
    if (task.status !== "completed") continue;
    add("video", task.video_hash, task.external_id);
    add("audio", task.audio_hash, task.external_id);
  }

  return [...groups.values()].filter((group) => group.externalIds.length > 1);
}

function playlistTitles(titles: Array<string | null>): string[] {
  return titles.filter((title): title is string => Boolean(title));
}

/**
 * Compares a playlist's titles with the files in its collection directories.
 */
export async function auditPlaylistFiles(url: string, settings: DownloaderSettings): Promise<PlaylistFileAudit> {
  const playlist = await fetchPlaylist(url);
  const destination = collectionDestination(settings, playlist.title);
  const titles = playlistTitles(playlist.videos.map((video) => video.title));

  const videoFiles = await listBasenames(destination.videoDir, settings.video.ext);
  const audioFiles = await listBasenames(destination.audioDir, settings.audio.ext);
  const missing = findMissingTitles(titles, videoFiles, audioFiles, settings.maxFilenameLength);

  console.log(
    `[audit] "${playlist.title}": ${titles.length} titles, ${videoFiles.length} videos, ` +
      `${audioFiles.length} audio files, ${missing.length} missing`
  );
  for (const entry of missing) {
    console.log(`[audit]   missing: ${entry.normalized} ("${entry.title}")`);
  }

  return {
    playlistTitle: playlist.title,
    videoDir: destination.videoDir,
    audioDir: destination.audioDir,
    expected: titles.length,
    videoFiles: videoFiles.length,
    audioFiles: audioFiles.length,
    missing,
  };
}

export async function auditPlaylistDuplicates(
  url: string,
  settings: DownloaderSettings
): Promise<PlaylistDuplicateAudit> {
  const playlist = await fetchPlaylist(url);
  const titles = playlistTitles(playlist.videos.map((video) => video.title));
  const duplicates = findDuplicateTitles(titles, settings.maxFilenameLength);

  if (duplicates.length === 0) {
    console.log(`[audit] "${playlist.title}": no duplicated titles`);
  } else {
    console.log(`[audit] "${playlist.title}": ${duplicates.length} duplicated title(s)`);
    for (const title of duplicates) {
      console.log(`[audit]   duplicate: "${title}" → ${normalizeTitle(title, settings.maxFilenameLength)}`);
    }
  }

  return { playlistTitle: playlist.title, duplicates };
}
