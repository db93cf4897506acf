/**
 * Error Message Utility
 * Classifies yt-dlp / ffmpeg failures and converts them into short log messages.
 */

import { DownloadError, type DownloadErrorKind } from "./errors.js";

const BOT_DETECTION_PATTERNS = [
  "not a bot",
  "confirm you're not a bot",
  "confirm you’re not a bot",
  "http error 429",
  "too many requests",
];

const UNAVAILABLE_PATTERNS = [
  "video unavailable",
  "this video has been removed",
  "this video is no longer available",
  "private video",
  "is private",
  "members-only",
  "join this channel",
  "confirm your age",
  "age-restricted",
  "not available in your country",
  "blocked it in your country",
  "copyright",
  "this live event will begin",
  "is live",
  "premieres in",
  "account associated with this video has been terminated",
];

const MALFORMED_PATTERNS = [
  "is not a valid url",
  "incomplete youtube id",
  "unsupported url",
];

/**
 * Picks the closest error kind from an arbitrary thrown value.
 * A DownloadError keeps its own kind.
 */
export function classifyFetchError(error: unknown): DownloadErrorKind {
  if (error instanceof DownloadError) {
    return error.kind;
  }

  const text = describeError(error).toLowerCase();

  if (BOT_DETECTION_PATTERNS.some((p) => text.includes(p))) {
    return "bot_detection";
  }
  if (MALFORMED_PATTERNS.some((p) => text.includes(p))) {
    return "unresolvable_reference";
  }
  if (UNAVAILABLE_PATTERNS.some((p) => text.includes(p))) {
    return "source_unavailable";
  }
  return "transient";
}

/**
 * Wraps any thrown value into a DownloadError with a classified kind.
 */
export function toDownloadError(error: unknown, context?: string): DownloadError {
  if (error instanceof DownloadError) {
    return error;
  }
  const kind = classifyFetchError(error);
  const message = context ? `${context}: ${describeError(error)}` : describeError(error);
  return new DownloadError(kind, message, { cause: error });
}

/**
 * Full error text, including the stderr a failed child process left behind.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const stderr = "stderr" in error ? error.stderr : undefined;
    if (typeof stderr === "string" && stderr.trim() && !error.message.includes(stderr.trim())) {
      return `${error.message}\n${stderr.trim()}`;
    }
    return error.message;
  }
  return String(error);
}

/**
 * Converts technical error to generic user-friendly message
 */
export function getGenericErrorMessage(error: unknown): string {
  switch (classifyFetchError(error)) {
    case "bot_detection":
      return "Blocked by bot detection";
    case "source_unavailable":
      return "Video unavailable";
    case "unresolvable_reference":
      return "Invalid video reference";
    case "no_matching_stream":
      return "No matching stream";
    case "uniqueness_exhausted":
      return "No free output name";
    case "transient":
      break;
  }

  const errorStr = describeError(error).toLowerCase();
  if (errorStr.includes("ffmpeg") || errorStr.includes("ffprobe") || errorStr.includes("audio")) {
    return "Media processing failed";
  }
  if (errorStr.includes("timeout") || errorStr.includes("timed out")) {
    return "Processing timeout";
  }
  if (errorStr.includes("enoent") || errorStr.includes("eacces") || errorStr.includes("enospc")) {
    return "Filesystem error";
  }
  if (errorStr.includes("yt-dlp") || errorStr.includes("download")) {
    return "Download failed";
  }
  return "Processing failed";
}
