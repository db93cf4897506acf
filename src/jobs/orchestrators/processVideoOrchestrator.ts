/**
 * Process Video Orchestrator
 * Coordinates the complete per-video workflow:
 * metadata → task → captions → video → audio → merge → finalize
 *
 * Every step checks the filesystem first, so a rerun resumes where the
 * previous one stopped.
 */

import { randomUUID } from "crypto";
import { mkdir } from "fs/promises";
import path from "path";
import type { Destination, DownloaderSettings } from "../../config/downloader.js";
import type { DownloadTask } from "../../repositories/taskRepository.js";
import { fetchVideoMetadata, type VideoMetadata } from "../../services/external/ytdlp.js";
import {
  addTask,
  extractExternalId,
  getTask,
  registerTask,
  updateTask,
} from "../../services/business/taskService.js";
import { exportCaptions } from "../../services/business/captionService.js";
import {
  acquireAudio,
  acquireVideo,
  mergeMedia,
  mergeTargetPath,
  type StagingArea,
} from "../../services/business/mediaService.js";
import { StreamCatalog } from "../../services/business/streamCatalog.js";
import { DownloadError, isDownloadError } from "../../utils/errors.js";
import { getGenericErrorMessage, toDownloadError } from "../../utils/errorMessages.js";
import { fileExists, hashFile } from "../../utils/files.js";
import { removeSessionFiles } from "../../utils/cleanupTemp.js";
import { withRetry } from "../../utils/retry.js";

export interface ProcessVideoInput {
  url: string;
  settings: DownloaderSettings;
  destination: Destination;
}

export type ProcessVideoOutcome = "completed" | "already_completed" | "dry_run";

export interface ProcessVideoResult {
  externalId: string;
  outcome: ProcessVideoOutcome;
  task: DownloadTask | null;
  title: string | null;
}

export interface FinalArtifacts {
  videoPath: string;
  audioPath: string;
  /** The separate merged copy written when the original video is kept. */
  mergedPath?: string | null;
}

/**
 * Path of the merged copy that sits beside the original video, or null when
 * merging writes into the final video itself (or is disabled).
 */
export function mergedArtifactPath(settings: DownloaderSettings, videoPath: string): string | null {
  if (!settings.steps.merge || !settings.video.keepOriginal) {
    return null;
  }
  return mergeTargetPath(videoPath, true);
}

/**
 * Hashes whichever final files exist and marks the task completed.
 */
export async function finalizeTask(externalId: string, artifacts: FinalArtifacts): Promise<DownloadTask | null> {
  const hasVideo = await fileExists(artifacts.videoPath);
  const hasAudio = await fileExists(artifacts.audioPath);
  const candidate = artifacts.mergedPath ?? null;
  const mergedPath = candidate !== null && (await fileExists(candidate)) ? candidate : null;

  return updateTask(externalId, {
    status: "completed",
    video_path: hasVideo ? artifacts.videoPath : null,
    audio_path: hasAudio ? artifacts.audioPath : null,
    merged_path: mergedPath,
    video_hash: hasVideo ? await hashFile(artifacts.videoPath) : null,
    audio_hash: hasAudio ? await hashFile(artifacts.audioPath) : null,
    merged_hash: mergedPath ? await hashFile(mergedPath) : null,
    error_message: null,
  });
}

async function resolveMetadata(url: string): Promise<VideoMetadata> {
  try {
    return await fetchVideoMetadata(url);
  } catch (error) {
    throw toDownloadError(error, "Metadata resolution failed");
  }
}

async function recordFailure(externalId: string, failure: DownloadError): Promise<void> {
  try {
    const current = await getTask(externalId);
    await updateTask(externalId, {
      status: "failed",
      error_message: failure.message,
      retry_count: (current?.retry_count ?? 0) + 1,
    });
  } catch (error) {
    console.error(`[orchestrator] Could not record failure for ${externalId}:`, error);
  }
}

async function runPipeline(externalId: string, input: ProcessVideoInput): Promise<ProcessVideoResult> {
  const { url, settings, destination } = input;
  const staging: StagingArea = { dir: settings.stagingDir, sessionToken: randomUUID() };

  await registerTask(url);

  try {
    // 1. Metadata
    const metadata = await resolveMetadata(url);
    console.log(`[orchestrator] ${externalId}: "${metadata.title}" (${Math.round(metadata.durationSeconds)}s)`);

    // 2. Names
    const task = await addTask({
      url,
      title: metadata.title,
      maxLength: settings.maxFilenameLength,
      maxNameAttempts: settings.maxNameAttempts,
      destination,
      videoExt: settings.video.ext,
      audioExt: settings.audio.ext,
    });
    if (!task?.final_video_name || !task.final_audio_name) {
      throw new DownloadError("uniqueness_exhausted", `No free output name for "${metadata.title}"`);
    }

    await updateTask(externalId, { status: "in_progress" });

    await mkdir(destination.videoDir, { recursive: true });
    await mkdir(destination.audioDir, { recursive: true });
    await mkdir(staging.dir, { recursive: true });

    const videoPath = path.join(destination.videoDir, task.final_video_name);
    const audioPath = path.join(destination.audioDir, task.final_audio_name);
    const catalog = new StreamCatalog(metadata.formats);

    // 3. Captions
    if (settings.steps.captions && metadata.captions.length > 0) {
      await exportCaptions(metadata.captions, destination.videoDir, task.final_video_name);
    }

    // 4. Video
    if (settings.steps.video) {
      if (await fileExists(videoPath)) {
        console.log(`[orchestrator] Video already on disk, skipping: ${task.final_video_name}`);
      } else {
        await acquireVideo({
          url,
          catalog,
          preferences: {
            mime: settings.video.mime,
            resolution: settings.video.resolution,
            progressive: settings.video.progressive,
            orderBy: settings.video.orderBy,
          },
          staging,
          finalPath: videoPath,
        });
      }
    }

    // 5. Audio
    if (settings.steps.audio) {
      if (await fileExists(audioPath)) {
        console.log(`[orchestrator] Audio already on disk, skipping: ${task.final_audio_name}`);
      } else {
        await acquireAudio({
          url,
          catalog,
          preferences: { mime: settings.audio.mime, bitrate: settings.audio.bitrate },
          staging,
          finalPath: audioPath,
          videoPath,
          codec: settings.audio.codec,
          keepOriginal: settings.audio.keepOriginal,
        });
      }
    }

    // 6. Merge
    if (settings.steps.merge && (await fileExists(videoPath)) && (await fileExists(audioPath))) {
      await mergeMedia({
        videoPath,
        audioPath,
        staging,
        keepOriginalVideo: settings.video.keepOriginal,
        videoCodec: settings.merge.videoCodec,
        audioCodec: settings.merge.audioCodec,
      });
    }

    // 7. Finalize
    const completed = await finalizeTask(externalId, {
      videoPath,
      audioPath,
      mergedPath: mergedArtifactPath(settings, videoPath),
    });
    console.log(`[orchestrator] ✓ Completed ${externalId} (${task.final_video_name})`);

    return { externalId, outcome: "completed", task: completed, title: metadata.title };
  } catch (error) {
    const failure = toDownloadError(error);
    await recordFailure(externalId, failure);
    console.error(`[orchestrator] ✗ ${externalId} failed (${failure.kind}): ${getGenericErrorMessage(failure)}`);
    throw failure;
  } finally {
    await removeSessionFiles(staging.dir, staging.sessionToken);
  }
}

/**
 * Runs the full workflow for one video reference.
 *
 * A completed task returns immediately, before any network call. Transient
 * failures are retried with the configured attempts and delay; every other
 * kind is thrown on the first failure.
 */
export async function processVideo(input: ProcessVideoInput): Promise<ProcessVideoResult> {
  const { url, settings } = input;

  const externalId = extractExternalId(url);
  if (!externalId) {
    throw new DownloadError("unresolvable_reference", `Could not extract a video id from: ${url}`);
  }

  const existing = await getTask(externalId);
  if (existing?.status === "completed") {
    console.log(`[orchestrator] ${externalId} already completed, skipping`);
    return { externalId, outcome: "already_completed", task: existing, title: null };
  }

  if (settings.dryRun) {
    const metadata = await resolveMetadata(url);
    console.log(
      `[orchestrator] [dry run] ${externalId}: "${metadata.title}" (${Math.round(metadata.durationSeconds)}s), ` +
        `${metadata.formats.length} formats, ${metadata.captions.length} caption tracks`
    );
    return { externalId, outcome: "dry_run", task: existing, title: metadata.title };
  }

  return withRetry(() => runPipeline(externalId, input), {
    attempts: settings.retry.attempts,
    delayMs: settings.retry.delayMs,
    label: externalId,
    shouldRetry: (error) => isDownloadError(error) && error.retryable,
  });
}
