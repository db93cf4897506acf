/**
 * Task Service
 * Business logic for download tasks: id extraction, name reservation
 * and guarded status changes.
 */

import path from "path";
import {
  findTaskByExternalId,
  insertTask,
  updateTaskRow,
  isFinalNameClaimed,
  UPDATABLE_COLUMNS,
  type DownloadTask,
  type TaskFields,
  type TaskStatus,
} from "../../repositories/taskRepository.js";
import type { Destination } from "../../config/downloader.js";
import { normalizeTitle, withNumericSuffix } from "../../utils/filename.js";
import { fileExists } from "../../utils/files.js";
import { DownloadError } from "../../utils/errors.js";

const ID_PATTERN = "([A-Za-z0-9_-]{11})";

const ID_PATTERNS = [
  new RegExp(`[?&]v=${ID_PATTERN}(?![A-Za-z0-9_-])`),
  new RegExp(`youtu\\.be/${ID_PATTERN}(?![A-Za-z0-9_-])`),
  new RegExp(`/(?:embed|shorts|live|v)/${ID_PATTERN}(?![A-Za-z0-9_-])`),
];

/** Status changes a task may go through. */
const ALLOWED_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["in_progress", "failed", "completed"],
  in_progress: ["completed", "failed"],
  failed: ["in_progress", "completed"],
  completed: [],
};

export interface AddTaskInput {
  url: string;
  title: string;
  maxLength: number;
  maxNameAttempts: number;
  destination: Destination;
  videoExt: string;
  audioExt: string;
}

/**
 * Extracts the 11-character video id from a YouTube URL.
 * Returns null when no id can be found.
 */
export function extractExternalId(url: string): string | null {
  for (const pattern of ID_PATTERNS) {
    const match = pattern.exec(url);
    if (match?.[1]) {
      return match[1];
    }
  }
  return null;
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return from === to || ALLOWED_TRANSITIONS[from].includes(to);
}

export async function getTask(externalId: string): Promise<DownloadTask | null> {
  return findTaskByExternalId(externalId);
}

/**
 * Ensures a row exists for the URL's video id, without names.
 */
export async function registerTask(url: string): Promise<DownloadTask> {
  const externalId = extractExternalId(url);
  if (!externalId) {
    throw new DownloadError("unresolvable_reference", `No video id in URL: ${url}`);
  }

  const existing = await findTaskByExternalId(externalId);
  if (existing) {
    return existing;
  }
  return insertTask({ external_id: externalId, source_url: url });
}

async function isCandidateTaken(
  videoName: string,
  audioName: string,
  destination: Destination
): Promise<boolean> {
  if (await isFinalNameClaimed("final_video_name", videoName)) return true;
  if (await isFinalNameClaimed("final_audio_name", audioName)) return true;
  if (await fileExists(path.join(destination.videoDir, videoName))) return true;
  return fileExists(path.join(destination.audioDir, audioName));
}

/**
 * Creates the task for a video (or names an existing bare one).
 * A task that already has final names is returned unchanged.
 *
 * Returns null when every `<base>_<n>` candidate up to maxNameAttempts is taken.
 */
export async function addTask(input: AddTaskInput): Promise<DownloadTask | null> {
  const externalId = extractExternalId(input.url);
  if (!externalId) {
    return null;
  }

  const existing = await findTaskByExternalId(externalId);
  if (existing?.final_video_name && existing.final_audio_name) {
    return existing;
  }

  const base = normalizeTitle(input.title, input.maxLength);

  for (let attempt = 0; attempt < input.maxNameAttempts; attempt++) {
    const stem = withNumericSuffix(base, attempt, input.maxLength);
    if (stem === null) {
      break;
    }
    const videoName = `${stem}.${input.videoExt}`;
    const audioName = `${stem}.${input.audioExt}`;

    if (await isCandidateTaken(videoName, audioName, input.destination)) {
      continue;
    }

    const names = {
      suggested_name_base: base,
      final_video_name: videoName,
      final_audio_name: audioName,
    };

    if (existing) {
      return updateTaskRow(externalId, names);
    }
    return insertTask({ external_id: externalId, source_url: input.url, ...names });
  }

  console.warn(
    `[tasks] No free name for ${externalId} after ${input.maxNameAttempts} attempts (base "${base}")`
  );
  return null;
}

/**
 * Applies a partial update. Unknown columns are dropped and
 * status changes that break the lifecycle are refused.
 *
 * Returns the stored task, or null when the input held no known column
 * or the task does not exist.
 */
export async function updateTask(
  externalId: string,
  fields: Record<string, unknown>
): Promise<DownloadTask | null> {
  const update = pickUpdatableFields(fields);

  if (Object.keys(update).length === 0) {
    console.warn(`[tasks] Empty update for ${externalId}, nothing written`);
    return null;
  }

  const current = await findTaskByExternalId(externalId);
  if (!current) {
    console.warn(`[tasks] Cannot update unknown task ${externalId}`);
    return null;
  }

  if (update.status && !canTransition(current.status, update.status)) {
    console.warn(
      `[tasks] Refusing status change ${current.status} -> ${update.status} for ${externalId}`
    );
    delete update.status;
    if (Object.keys(update).length === 0) {
      return current;
    }
  }

  return updateTaskRow(externalId, update);
}

function pickUpdatableFields(fields: Record<string, unknown>): TaskFields {
  const update: TaskFields = {};
  for (const column of UPDATABLE_COLUMNS) {
    if (!(column in fields)) continue;
    const value = fields[column];

    switch (column) {
      case "status":
        if (isTaskStatus(value)) update.status = value;
        break;
      case "retry_count":
        if (typeof value === "number" && Number.isInteger(value)) update.retry_count = value;
        break;
      case "source_url":
        if (typeof value === "string") update.source_url = value;
        break;
      default:
        if (typeof value === "string" || value === null) update[column] = value;
    }
  }
  return update;
}

function isTaskStatus(value: unknown): value is TaskStatus {
  return value === "pending" || value === "in_progress" || value === "completed" || value === "failed";
}
