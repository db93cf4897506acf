/**
 * Batch Orchestrator
 * Runs the per-video workflow over lists, playlists, channels and searches.
 * One item's failure is logged and counted; the batch always continues.
 */

import path from "path";
import {
  collectionDestination,
  defaultDestination,
  type Destination,
  type DownloaderSettings,
} from "../../config/downloader.js";
import type { SearchQuery, Sources } from "../../config/sources.js";
import {
  fetchChannel,
  fetchPlaylist,
  searchVideos,
  type VideoCollection,
  type VideoRef,
} from "../../services/external/ytdlp.js";
import { extractExternalId, getTask } from "../../services/business/taskService.js";
import { hasAudioTrack, mergeTargetPath } from "../../services/business/mediaService.js";
import { finalizeTask, mergedArtifactPath, processVideo } from "./processVideoOrchestrator.js";
import { fileExists } from "../../utils/files.js";
import { classifyFetchError, describeError, getGenericErrorMessage } from "../../utils/errorMessages.js";

export type VideoReference = string | VideoRef;

export interface BatchContext {
  settings: DownloaderSettings;
  /** Defaults to the configured video/audio directories. */
  destination?: Destination;
  signal?: AbortSignal;
}

export interface BatchSummary {
  total: number;
  completed: number;
  skipped: number;
  failed: number;
  cancelled: number;
}

type PrecheckResult = "already_completed" | "finalized" | "run";

export function emptySummary(): BatchSummary {
  return { total: 0, completed: 0, skipped: 0, failed: 0, cancelled: 0 };
}

export function mergeSummaries(a: BatchSummary, b: BatchSummary): BatchSummary {
  return {
    total: a.total + b.total,
    completed: a.completed + b.completed,
    skipped: a.skipped + b.skipped,
    failed: a.failed + b.failed,
    cancelled: a.cancelled + b.cancelled,
  };
}

function referenceUrl(ref: VideoReference): string {
  return typeof ref === "string" ? ref : ref.watchUrl;
}

/**
 * Completes a named task without the full workflow when every enabled
 * output is already on disk. With merging enabled the merge target must
 * also carry an audio track, otherwise the workflow runs to finish the merge.
 */
async function precheck(url: string, settings: DownloaderSettings, destination: Destination): Promise<PrecheckResult> {
  const externalId = extractExternalId(url);
  if (!externalId) return "run";

  const task = await getTask(externalId);
  if (!task) return "run";
  if (task.status === "completed") return "already_completed";
  if (!task.final_video_name || !task.final_audio_name) return "run";
  if (settings.dryRun || (!settings.steps.video && !settings.steps.audio)) return "run";

  const videoPath = path.join(destination.videoDir, task.final_video_name);
  const audioPath = path.join(destination.audioDir, task.final_audio_name);

  if (settings.steps.video && !(await fileExists(videoPath))) return "run";
  if (settings.steps.audio && !(await fileExists(audioPath))) return "run";

  if (settings.steps.merge && (await fileExists(videoPath)) && (await fileExists(audioPath))) {
    const target = mergeTargetPath(videoPath, settings.video.keepOriginal);
    if (!(await hasAudioTrack(target))) return "run";
  }

  await finalizeTask(externalId, { videoPath, audioPath, mergedPath: mergedArtifactPath(settings, videoPath) });
  console.log(`[batch] ${externalId} outputs already on disk, marked completed`);
  return "finalized";
}

function logItemFailure(url: string, error: unknown): void {
  if (classifyFetchError(error) === "bot_detection") {
    console.error(`[batch] ✗ Bot detection triggered for ${url}. Provide cookies (YOUTUBE_COOKIES_PATH) or slow down.`);
    return;
  }
  console.error(`[batch] ✗ ${url}: ${getGenericErrorMessage(error)} (${describeError(error)})`);
}

/**
 * Processes references in order, one at a time.
 */
export async function processVideoList(refs: VideoReference[], context: BatchContext): Promise<BatchSummary> {
  const { settings, signal } = context;
  const destination = context.destination ?? defaultDestination(settings);
  const summary = emptySummary();

  for (let i = 0; i < refs.length; i++) {
    if (signal?.aborted) {
      summary.cancelled = refs.length - i;
      console.warn(`[batch] Cancelled, ${summary.cancelled} item(s) not processed`);
      break;
    }

    const ref = refs[i];
    if (ref === undefined) continue;
    const url = referenceUrl(ref);
    summary.total++;
    console.log(`[batch] [${i + 1}/${refs.length}] ${url}`);

    try {
      const check = await precheck(url, settings, destination);
      if (check === "already_completed") {
        summary.skipped++;
        continue;
      }
      if (check === "finalized") {
        summary.completed++;
        continue;
      }

      const result = await processVideo({ url, settings, destination });
      if (result.outcome === "completed") {
        summary.completed++;
      } else {
        summary.skipped++;
      }
    } catch (error) {
      summary.failed++;
      logItemFailure(url, error);
    }
  }

  console.log(
    `[batch] Done: ${summary.completed} completed, ${summary.skipped} skipped, ` +
      `${summary.failed} failed, ${summary.cancelled} cancelled`
  );
  return summary;
}

async function processCollection(
  kind: string,
  collection: VideoCollection,
  context: BatchContext
): Promise<BatchSummary> {
  const destination = collectionDestination(context.settings, collection.title);
  console.log(`[batch] ${kind} "${collection.title}": ${collection.videos.length} videos → ${destination.videoDir}`);
  return processVideoList(collection.videos, { ...context, destination });
}

export async function processPlaylist(url: string, context: BatchContext): Promise<BatchSummary> {
  return processCollection("Playlist", await fetchPlaylist(url), context);
}

export async function processChannel(url: string, context: BatchContext): Promise<BatchSummary> {
  return processCollection("Channel", await fetchChannel(url), context);
}

export async function processSearch(search: SearchQuery, context: BatchContext): Promise<BatchSummary> {
  const refs = await searchVideos(search.query, {
    sortBy: search.sortBy,
    uploadDate: search.uploadDate,
    type: search.type,
    limit: search.limit,
  });
  console.log(`[batch] Search "${search.query}": ${refs.length} results`);
  return processVideoList(refs, { ...context, destination: defaultDestination(context.settings) });
}

async function runSection<T>(
  label: string,
  items: T[],
  enabled: boolean,
  run: (item: T) => Promise<BatchSummary>,
  signal: AbortSignal | undefined
): Promise<BatchSummary> {
  let summary = emptySummary();
  if (items.length === 0) return summary;
  if (!enabled) {
    console.log(`[batch] ${label} disabled, skipping ${items.length} item(s)`);
    return summary;
  }

  for (const item of items) {
    if (signal?.aborted) break;
    try {
      summary = mergeSummaries(summary, await run(item));
    } catch (error) {
      console.error(`[batch] ✗ ${label} item failed, skipping: ${describeError(error)}`);
    }
  }
  return summary;
}

/**
 * Individual videos first, then playlists, channels and searches.
 */
export async function runSources(sources: Sources, context: BatchContext): Promise<BatchSummary> {
  const { settings, signal } = context;
  let summary = emptySummary();

  if (sources.videos.length > 0) {
    console.log(`[batch] Individual videos: ${sources.videos.length}`);
    summary = mergeSummaries(
      summary,
      await processVideoList(sources.videos, { ...context, destination: defaultDestination(settings) })
    );
  }

  summary = mergeSummaries(
    summary,
    await runSection("Playlists", sources.playlists, settings.sections.playlists, (url) => processPlaylist(url, context), signal)
  );
  summary = mergeSummaries(
    summary,
    await runSection("Channels", sources.channels, settings.sections.channels, (url) => processChannel(url, context), signal)
  );
  summary = mergeSummaries(
    summary,
    await runSection("Searches", sources.searches, settings.sections.searches, (search) => processSearch(search, context), signal)
  );

  return summary;
}
