/**
 * Downloader Configuration
 * Pipeline settings (directories, enabled steps, stream preferences, codecs, retry)
 * parsed from environment variables.
 *
 * `parseDownloaderSettings` is pure so it can be tested with plain objects;
 * `loadDownloaderSettings` is the process.env wrapper used by the scripts.
 */

import os from "os";
import path from "path";
import { z } from "zod";
import { ConfigError } from "../utils/errors.js";
import { normalizeTitle } from "../utils/filename.js";

/** Keys a filtered stream list can be ordered by. */
export const STREAM_ORDER_KEYS = ["formatId", "resolution", "bitrate", "filesize"] as const;
export type StreamOrderKey = (typeof STREAM_ORDER_KEYS)[number];

export interface DownloaderSettings {
  baseDir: string;
  videoDir: string;
  audioDir: string;
  stagingDir: string;
  maxFilenameLength: number;
  /** Upper bound on `<base>_<n>` candidates tried before giving up. */
  maxNameAttempts: number;
  dryRun: boolean;
  steps: {
    captions: boolean;
    video: boolean;
    audio: boolean;
    merge: boolean;
  };
  video: {
    ext: string;
    mime: string;
    resolution: string;
    progressive: boolean;
    orderBy: StreamOrderKey;
    keepOriginal: boolean;
  };
  audio: {
    ext: string;
    mime: string;
    bitrate: string;
    /** null lets ffmpeg pick the encoder from the extension */
    codec: string | null;
    keepOriginal: boolean;
  };
  merge: {
    videoCodec: string | null;
    audioCodec: string | null;
  };
  retry: {
    attempts: number;
    delayMs: number;
  };
  sections: {
    playlists: boolean;
    channels: boolean;
    searches: boolean;
  };
}

/** Where one batch writes its files. */
export interface Destination {
  videoDir: string;
  audioDir: string;
}

export type SettingsInput = Record<string, string | undefined>;

const TRUE_VALUES = ["true", "1", "yes", "on"] as const;
const FALSE_VALUES = ["false", "0", "no", "off"] as const;

function blankToUndefined(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function flag(defaultValue: boolean) {
  return z.preprocess(
    (value) => {
      const cleaned = blankToUndefined(value);
      return typeof cleaned === "string" ? cleaned.toLowerCase() : cleaned;
    },
    z
      .enum([...TRUE_VALUES, ...FALSE_VALUES])
      .default(defaultValue ? "true" : "false")
      .transform((value) => (TRUE_VALUES as readonly string[]).includes(value))
  );
}

function positiveInt(defaultValue: number) {
  return z.preprocess(blankToUndefined, z.coerce.number().int().min(1).default(defaultValue));
}

function nonNegativeInt(defaultValue: number) {
  return z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(defaultValue));
}

function text(defaultValue: string) {
  return z.preprocess(blankToUndefined, z.string().default(defaultValue));
}

const optionalText = z.preprocess(blankToUndefined, z.string().optional());

const extension = (defaultValue: string) =>
  z.preprocess(
    blankToUndefined,
    z
      .string()
      .regex(/^[a-z0-9]+$/i, "must be a bare extension such as mp4")
      .default(defaultValue)
  );

const settingsSchema = z.object({
  BASE_DIR: text("./downloads"),
  VIDEO_DIR: optionalText,
  AUDIO_DIR: optionalText,
  STAGING_DIR: optionalText,
  MAX_FILENAME_LENGTH: positiveInt(63),
  MAX_NAME_ATTEMPTS: positiveInt(100),
  DRY_RUN: flag(false),
  DOWNLOAD_CAPTIONS: flag(true),
  DOWNLOAD_VIDEO: flag(true),
  DOWNLOAD_AUDIO: flag(true),
  MERGE_MEDIA: flag(false),
  VIDEO_EXT: extension("mp4"),
  VIDEO_MIME: extension("mp4"),
  VIDEO_RESOLUTION: z.preprocess(
    blankToUndefined,
    z.string().regex(/^\d+p$/, "must look like 1080p").default("1080p")
  ),
  PROGRESSIVE: flag(false),
  STREAM_ORDER_BY: z.preprocess(blankToUndefined, z.enum(STREAM_ORDER_KEYS).default("formatId")),
  KEEP_ORIGINAL_VIDEO: flag(false),
  AUDIO_EXT: extension("mp3"),
  AUDIO_MIME: extension("mp4"),
  AUDIO_BITRATE: z.preprocess(
    blankToUndefined,
    z.string().regex(/^\d+kbps$/, "must look like 128kbps").default("128kbps")
  ),
  AUDIO_CODEC: optionalText,
  KEEP_ORIGINAL_AUDIO: flag(false),
  MERGE_VIDEO_CODEC: optionalText,
  MERGE_AUDIO_CODEC: text("aac"),
  RETRY_ATTEMPTS: positiveInt(3),
  RETRY_DELAY_SECONDS: nonNegativeInt(30),
  ENABLE_PLAYLISTS: flag(true),
  ENABLE_CHANNELS: flag(true),
  ENABLE_SEARCHES: flag(true),
});

/**
 * Parse and validate pipeline settings.
 * Pure function - no I/O, only transforms input to output.
 */
export function parseDownloaderSettings(input: SettingsInput): DownloaderSettings {
  const result = settingsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues;
    const details = issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`, String(issues[0]?.path[0] ?? "unknown"));
  }

  const env = result.data;
  const baseDir = path.resolve(env.BASE_DIR);

  return {
    baseDir,
    videoDir: path.resolve(env.VIDEO_DIR ?? path.join(baseDir, "video")),
    audioDir: path.resolve(env.AUDIO_DIR ?? path.join(baseDir, "audio")),
    stagingDir: path.resolve(env.STAGING_DIR ?? path.join(os.tmpdir(), "tube-archiver-staging")),
    maxFilenameLength: env.MAX_FILENAME_LENGTH,
    maxNameAttempts: env.MAX_NAME_ATTEMPTS,
    dryRun: env.DRY_RUN,
    steps: {
      captions: env.DOWNLOAD_CAPTIONS,
      video: env.DOWNLOAD_VIDEO,
      audio: env.DOWNLOAD_AUDIO,
      merge: env.MERGE_MEDIA,
    },
    video: {
      ext: env.VIDEO_EXT,
      mime: env.VIDEO_MIME,
      resolution: env.VIDEO_RESOLUTION,
      progressive: env.PROGRESSIVE,
      orderBy: env.STREAM_ORDER_BY,
      keepOriginal: env.KEEP_ORIGINAL_VIDEO,
    },
    audio: {
      ext: env.AUDIO_EXT,
      mime: env.AUDIO_MIME,
      bitrate: env.AUDIO_BITRATE,
      codec: env.AUDIO_CODEC ?? null,
      keepOriginal: env.KEEP_ORIGINAL_AUDIO,
    },
    merge: {
      videoCodec: env.MERGE_VIDEO_CODEC ?? null,
      audioCodec: env.MERGE_AUDIO_CODEC,
    },
    retry: {
      attempts: env.RETRY_ATTEMPTS,
      delayMs: env.RETRY_DELAY_SECONDS * 1000,
    },
    sections: {
      playlists: env.ENABLE_PLAYLISTS,
      channels: env.ENABLE_CHANNELS,
      searches: env.ENABLE_SEARCHES,
    },
  };
}

/**
 * Load settings from process.env (convenience wrapper).
 */
export function loadDownloaderSettings(): DownloaderSettings {
  return parseDownloaderSettings(process.env);
}

/** The default destination used for individual videos and searches. */
export function defaultDestination(settings: DownloaderSettings): Destination {
  return { videoDir: settings.videoDir, audioDir: settings.audioDir };
}

/**
 * Per-collection destination: `<baseDir>/<title>` and `<baseDir>/<title>-Audio`.
 */
export function collectionDestination(settings: DownloaderSettings, title: string): Destination {
  const name = normalizeTitle(title, settings.maxFilenameLength);
  return {
    videoDir: path.join(settings.baseDir, name),
    audioDir: path.join(settings.baseDir, `${name}-Audio`),
  };
}
