/**
 * Media Service
 * Video/audio acquisition and merging. Everything is produced in the staging
 * directory under the session token, then moved to its final location.
 */

import path from "path";
import { rm } from "fs/promises";
import { downloadFormat } from "../external/ytdlp.js";
import { openAudio, openVideo, writeAudio, muxVideoAudio, type MediaHandle } from "../external/ffmpeg.js";
import {
  selectAudioStream,
  selectVideoStream,
  type AudioPreferences,
  type StreamCatalog,
  type VideoPreferences,
} from "./streamCatalog.js";
import { DownloadError } from "../../utils/errors.js";
import { fileExists, moveFile } from "../../utils/files.js";

export interface StagingArea {
  dir: string;
  sessionToken: string;
}

export interface AcquireVideoInput {
  url: string;
  catalog: StreamCatalog;
  preferences: VideoPreferences;
  staging: StagingArea;
  finalPath: string;
}

export interface AcquireAudioInput {
  url: string;
  catalog: StreamCatalog;
  preferences: AudioPreferences;
  staging: StagingArea;
  finalPath: string;
  /** Final video to extract from; ignored when it is missing or silent. */
  videoPath: string | null;
  codec: string | null;
  keepOriginal: boolean;
}

export interface MergeInput {
  videoPath: string;
  audioPath: string;
  staging: StagingArea;
  keepOriginalVideo: boolean;
  videoCodec: string | null;
  audioCodec: string | null;
}

export interface MergeResult {
  targetPath: string;
  merged: boolean;
}

export type AudioSource = "video" | "stream";

export function stagingPath(staging: StagingArea, label: string, ext: string): string {
  return path.join(staging.dir, `${staging.sessionToken}.${label}.${ext.replace(/^\./, "")}`);
}

function closeAll(handles: Array<MediaHandle | null>): void {
  for (const handle of handles) {
    handle?.close();
  }
}

/**
 * Downloads the selected video stream and moves it to `finalPath`.
 */
export async function acquireVideo(input: AcquireVideoInput): Promise<string> {
  const format = selectVideoStream(input.catalog, input.preferences);
  if (!format) {
    throw new DownloadError(
      "no_matching_stream",
      `No video stream (progressive=${input.preferences.progressive}) for ${input.url}`
    );
  }

  const finalExt = path.extname(input.finalPath).slice(1);
  if (format.ext !== finalExt) {
    console.warn(`[media] Selected format ${format.formatId} is ${format.ext}, saving as .${finalExt}`);
  }

  const stagedName = path.basename(stagingPath(input.staging, "video", format.ext));
  const staged = await downloadFormat(input.url, format.formatId, input.staging.dir, stagedName);
  await moveFile(staged, input.finalPath);

  console.log(`[media] ✓ Video (${format.resolution ?? "?"}, format ${format.formatId}) → ${input.finalPath}`);
  return input.finalPath;
}

/**
 * Writes the final audio file, from the final video when it has an audio
 * track, otherwise from a separately downloaded audio stream.
 */
export async function acquireAudio(input: AcquireAudioInput): Promise<AudioSource> {
  const audioExt = path.extname(input.finalPath).slice(1);
  const stagedOutput = stagingPath(input.staging, "audio", audioExt);

  if (input.videoPath && (await fileExists(input.videoPath))) {
    const video = await openVideo(input.videoPath);
    try {
      if (video.hasAudio) {
        await writeAudio(video, stagedOutput, input.codec);
        await moveFile(stagedOutput, input.finalPath);
        console.log(`[media] ✓ Audio extracted from video → ${input.finalPath}`);
        return "video";
      }
    } finally {
      video.close();
    }
  }

  const format = selectAudioStream(input.catalog, input.preferences);
  if (!format) {
    throw new DownloadError("no_matching_stream", `No audio stream for ${input.url}`);
  }

  const sourceName = path.basename(stagingPath(input.staging, "source", format.ext));
  const source = await downloadFormat(input.url, format.formatId, input.staging.dir, sourceName);

  const handle = await openAudio(source);
  try {
    await writeAudio(handle, stagedOutput, input.codec);
  } finally {
    handle.close();
  }
  await moveFile(stagedOutput, input.finalPath);

  if (input.keepOriginal && format.ext !== audioExt) {
    const original = path.join(
      path.dirname(input.finalPath),
      `${path.basename(input.finalPath, `.${audioExt}`)}.${format.ext}`
    );
    await moveFile(source, original);
    console.log(`[media] Kept original audio → ${original}`);
  } else {
    await rm(source, { force: true });
  }

  console.log(`[media] ✓ Audio (${format.bitrate ?? "?"}, format ${format.formatId}) → ${input.finalPath}`);
  return "stream";
}

export function mergeTargetPath(videoPath: string, keepOriginalVideo: boolean): string {
  if (!keepOriginalVideo) {
    return videoPath;
  }
  const ext = path.extname(videoPath);
  return path.join(path.dirname(videoPath), `${path.basename(videoPath, ext)}.merged${ext}`);
}

/** True when `filePath` exists and carries an audio track. */
export async function hasAudioTrack(filePath: string): Promise<boolean> {
  if (!(await fileExists(filePath))) {
    return false;
  }
  const handle = await openVideo(filePath);
  try {
    return handle.hasAudio;
  } finally {
    handle.close();
  }
}

/**
 * Muxes the final audio into the final video. A target that already has an
 * audio track is left as it is.
 */
export async function mergeMedia(input: MergeInput): Promise<MergeResult> {
  const targetPath = mergeTargetPath(input.videoPath, input.keepOriginalVideo);

  if (await hasAudioTrack(targetPath)) {
    console.log(`[media] Merge skipped, ${path.basename(targetPath)} already has audio`);
    return { targetPath, merged: false };
  }

  const ext = path.extname(input.videoPath).slice(1);
  const staged = stagingPath(input.staging, "merged", ext);

  let video: MediaHandle | null = null;
  let audio: MediaHandle | null = null;
  try {
    video = await openVideo(input.videoPath);
    audio = await openAudio(input.audioPath);
    await muxVideoAudio(video, audio, staged, {
      videoCodec: input.videoCodec,
      audioCodec: input.audioCodec,
      tempAudioPath: input.audioCodec ? stagingPath(input.staging, "merge-audio", "mka") : null,
    });
  } finally {
    closeAll([video, audio]);
  }

  await moveFile(staged, targetPath);
  console.log(`[media] ✓ Merged → ${targetPath}`);
  return { targetPath, merged: true };
}
