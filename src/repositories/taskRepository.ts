/**
 * Task Repository
 * Database access layer for the download task table.
 */

import { z } from "zod";
import { supabase } from "../config/supabase.js";
import { TASKS_TABLE } from "../config/env.js";

export const TASK_STATUSES = ["pending", "in_progress", "completed", "failed"] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const taskRowSchema = z.object({
  external_id: z.string(),
  source_url: z.string(),
  suggested_name_base: z.string().nullable(),
  final_video_name: z.string().nullable(),
  final_audio_name: z.string().nullable(),
  status: z.enum(TASK_STATUSES),
  video_path: z.string().nullable(),
  audio_path: z.string().nullable(),
  merged_path: z.string().nullable(),
  video_hash: z.string().nullable(),
  audio_hash: z.string().nullable(),
  merged_hash: z.string().nullable(),
  retry_count: z.number().int(),
  error_message: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

export type DownloadTask = z.infer<typeof taskRowSchema>;

/** Columns callers may change after creation. */
export const UPDATABLE_COLUMNS = [
  "source_url",
  "suggested_name_base",
  "final_video_name",
  "final_audio_name",
  "status",
  "video_path",
  "audio_path",
  "merged_path",
  "video_hash",
  "audio_hash",
  "merged_hash",
  "retry_count",
  "error_message",
] as const;

export type UpdatableColumn = (typeof UPDATABLE_COLUMNS)[number];
export type TaskFields = Partial<Pick<DownloadTask, UpdatableColumn>>;

export interface CreateTaskInput {
  external_id: string;
  source_url: string;
  suggested_name_base?: string | null;
  final_video_name?: string | null;
  final_audio_name?: string | null;
}

export type FinalNameColumn = "final_video_name" | "final_audio_name";

/**
 * Finds a task by its external video id.
 */
export async function findTaskByExternalId(externalId: string): Promise<DownloadTask | null> {
  const { data, error } = await supabase
    .from(TASKS_TABLE)
    .select()
    .eq("external_id", externalId)
    .maybeSingle();

  if (error) {
    throw new Error(`Failed to find task: ${error.message}`);
  }

  return data ? taskRowSchema.parse(data) : null;
}

/**
 * Inserts a new task with "pending" status.
 */
export async function insertTask(input: CreateTaskInput): Promise<DownloadTask> {
  const now = new Date().toISOString();
  const { data, error } = await supabase
    .from(TASKS_TABLE)
    .insert({
      external_id: input.external_id,
      source_url: input.source_url,
      suggested_name_base: input.suggested_name_base ?? null,
      final_video_name: input.final_video_name ?? null,
      final_audio_name: input.final_audio_name ?? null,
      status: "pending",
      retry_count: 0,
      created_at: now,
      updated_at: now,
    })
    .select()
    .single();

  if (error) {
    throw new Error(`Failed to insert task: ${error.message}`);
  }

  return taskRowSchema.parse(data);
}

/**
 * Writes the given columns and stamps updated_at.
 */
export async function updateTaskRow(externalId: string, fields: TaskFields): Promise<DownloadTask> {
  const { data, error } = await supabase
    .from(TASKS_TABLE)
    .update({
      ...fields,
      updated_at: new Date().toISOString(),
    })
    .eq("external_id", externalId)
    .select()
    .single();

  if (error) {
    throw new Error(`Failed to update task: ${error.message}`);
  }

  return taskRowSchema.parse(data);
}

/**
 * True when some task already owns `name` in the given column.
 */
export async function isFinalNameClaimed(column: FinalNameColumn, name: string): Promise<boolean> {
  const { count, error } = await supabase
    .from(TASKS_TABLE)
    .select("external_id", { count: "exact", head: true })
    .eq(column, name);

  if (error) {
    throw new Error(`Failed to check claimed name: ${error.message}`);
  }

  return (count ?? 0) > 0;
}

export async function countTasksByExternalId(externalId: string): Promise<number> {
  const { count, error } = await supabase
    .from(TASKS_TABLE)
    .select("external_id", { count: "exact", head: true })
    .eq("external_id", externalId);

  if (error) {
    throw new Error(`Failed to count tasks: ${error.message}`);
  }

  return count ?? 0;
}

/**
 * Lists tasks, optionally filtered by status, oldest first.
 */
export async function listTasks(status?: TaskStatus): Promise<DownloadTask[]> {
  let query = supabase.from(TASKS_TABLE).select().order("created_at", { ascending: true });
  if (status) {
    query = query.eq("status", status);
  }

  const { data, error } = await query;

  if (error) {
    throw new Error(`Failed to list tasks: ${error.message}`);
  }

  return z.array(taskRowSchema).parse(data ?? []);
}
