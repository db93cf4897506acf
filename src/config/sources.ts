/**
 * Sources File
 * JSON list of what a run should archive: individual videos, playlists,
 * channels and search queries.
 */

import { readFile } from "fs/promises";
import { z } from "zod";
import {
  SEARCH_RESULT_TYPES,
  SEARCH_SORT_OPTIONS,
  SEARCH_UPLOAD_DATES,
} from "../services/external/youtubeSearch.js";
import { ConfigError } from "../utils/errors.js";

export const searchQuerySchema = z.object({
  query: z.string().trim().min(1, "query must not be empty"),
  sortBy: z.enum(SEARCH_SORT_OPTIONS).default("relevance"),
  uploadDate: z.enum(SEARCH_UPLOAD_DATES).default("any"),
  type: z.enum(SEARCH_RESULT_TYPES).default("video"),
  limit: z.number().int().min(1).max(100).default(5),
});

export const sourcesSchema = z.object({
  videos: z.array(z.string().trim().min(1)).default([]),
  playlists: z.array(z.string().url()).default([]),
  channels: z.array(z.string().url()).default([]),
  searches: z.array(searchQuerySchema).default([]),
});

export type SearchQuery = z.infer<typeof searchQuerySchema>;
export type Sources = z.infer<typeof sourcesSchema>;

export function parseSources(raw: unknown): Sources {
  const result = sourcesSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid sources file: ${details}`, "sources");
  }
  return result.data;
}

export async function loadSources(filePath: string): Promise<Sources> {
  const content = await readFile(filePath, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Sources file ${filePath} is not valid JSON: ${String(error)}`, "sources");
  }
  return parseSources(raw);
}
