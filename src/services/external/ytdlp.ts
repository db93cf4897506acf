/**
 * yt-dlp Service
 * Metadata, stream downloads and playlist/channel/search enumeration
 * through the yt-dlp CLI.
 */

import { execa } from "execa";
import fs from "fs";
import { mkdir } from "fs/promises";
import path from "path";
import { z } from "zod";
import { DownloadError } from "../../utils/errors.js";
import { toDownloadError } from "../../utils/errorMessages.js";
import { buildSearchUrl, type SearchFilters } from "./youtubeSearch.js";

const YTDLP_PATH = process.env.YTDLP_PATH || "yt-dlp";

// Netscape-format cookie file; helps with bot detection on cloud IPs
const COOKIES_PATH = process.env.YOUTUBE_COOKIES_PATH;

const USER_AGENT = "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36";

const MAX_JSON_BUFFER = 256 * 1024 * 1024;

export interface StreamFormat {
  formatId: string;
  ext: string;
  /** "video/mp4", "audio/webm", ... (m4a is reported as audio/mp4) */
  mimeType: string;
  subtype: string;
  hasVideo: boolean;
  hasAudio: boolean;
  progressive: boolean;
  height: number | null;
  resolution: string | null;
  abr: number | null;
  bitrate: string | null;
  filesize: number | null;
}

export interface CaptionTrack {
  /** Language code; automatic tracks are prefixed with "a." */
  code: string;
  name: string | null;
  url: string;
  ext: string;
  automatic: boolean;
}

export interface VideoMetadata {
  externalId: string;
  title: string;
  durationSeconds: number;
  captions: CaptionTrack[];
  formats: StreamFormat[];
}

export interface VideoRef {
  watchUrl: string;
  title: string | null;
}

export interface VideoCollection {
  title: string;
  videos: VideoRef[];
}

export interface SearchOptions extends SearchFilters {
  limit: number;
}

const formatSchema = z.object({
  format_id: z.string(),
  ext: z.string(),
  vcodec: z.string().nullish(),
  acodec: z.string().nullish(),
  height: z.number().nullish(),
  abr: z.number().nullish(),
  filesize: z.number().nullish(),
  filesize_approx: z.number().nullish(),
});

const captionFormatSchema = z.object({
  ext: z.string(),
  url: z.string(),
  name: z.string().nullish(),
});

const captionMapSchema = z.record(z.array(captionFormatSchema));

const metadataSchema = z.object({
  id: z.string(),
  title: z.string(),
  duration: z.number().nullish(),
  formats: z.array(formatSchema).nullish(),
  subtitles: captionMapSchema.nullish(),
  automatic_captions: captionMapSchema.nullish(),
});

const entrySchema = z.object({
  id: z.string().nullish(),
  title: z.string().nullish(),
});

const collectionSchema = z.object({
  title: z.string().nullish(),
  channel: z.string().nullish(),
  uploader: z.string().nullish(),
  entries: z.array(entrySchema.nullable()).nullish(),
});

type RawFormat = z.infer<typeof formatSchema>;
type RawCaptionMap = z.infer<typeof captionMapSchema>;

const VIDEO_ID = /^[A-Za-z0-9_-]{11}$/;

// Caption formats in order of preference
const CAPTION_EXTS = ["vtt", "srv1", "srt", "ttml", "json3"];

const CHANNEL_TABS = /\/(videos|shorts|streams|playlists|featured)\/?$/;

function baseArgs(): string[] {
  const args = ["--no-warnings", "--user-agent", USER_AGENT];
  if (COOKIES_PATH && fs.existsSync(COOKIES_PATH)) {
    args.push("--cookies", COOKIES_PATH);
  }
  return args;
}

async function runYtDlp(args: string[], context: string): Promise<string> {
  try {
    const { stdout } = await execa(YTDLP_PATH, [...baseArgs(), ...args], {
      maxBuffer: MAX_JSON_BUFFER,
    });
    return stdout;
  } catch (error) {
    throw toDownloadError(error, context);
  }
}

async function dumpJson<T>(args: string[], schema: z.ZodType<T, z.ZodTypeDef, unknown>, context: string): Promise<T> {
  const stdout = await runYtDlp(["--dump-single-json", ...args], context);

  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch (error) {
    throw new DownloadError("transient", `${context}: yt-dlp returned invalid JSON`, { cause: error });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new DownloadError("transient", `${context}: unexpected yt-dlp output (${parsed.error.message})`);
  }
  return parsed.data;
}

function toStreamFormat(format: RawFormat): StreamFormat | null {
  const hasVideo = Boolean(format.vcodec) && format.vcodec !== "none";
  const hasAudio = Boolean(format.acodec) && format.acodec !== "none";
  if (!hasVideo && !hasAudio) {
    return null; // storyboards
  }

  const subtype = format.ext === "m4a" ? "mp4" : format.ext;
  const abr = hasAudio ? format.abr ?? null : null;

  return {
    formatId: format.format_id,
    ext: format.ext,
    mimeType: `${hasVideo ? "video" : "audio"}/${subtype}`,
    subtype,
    hasVideo,
    hasAudio,
    progressive: hasVideo && hasAudio,
    height: hasVideo ? format.height ?? null : null,
    resolution: hasVideo && format.height ? `${format.height}p` : null,
    abr,
    bitrate: abr ? `${Math.round(abr)}kbps` : null,
    filesize: format.filesize ?? format.filesize_approx ?? null,
  };
}

function pickCaptionFormat(formats: z.infer<typeof captionFormatSchema>[]) {
  for (const ext of CAPTION_EXTS) {
    const match = formats.find((f) => f.ext === ext);
    if (match) return match;
  }
  return formats[0];
}

/**
 * Manual tracks keep their language code. Automatic tracks are limited to the
 * spoken language (yt-dlp marks it "-orig") and get the "a." prefix.
 */
function toCaptionTracks(subtitles: RawCaptionMap | null | undefined, automatic: RawCaptionMap | null | undefined): CaptionTrack[] {
  const tracks: CaptionTrack[] = [];

  for (const [lang, formats] of Object.entries(subtitles ?? {})) {
    if (lang === "live_chat") continue;
    const format = pickCaptionFormat(formats);
    if (format) {
      tracks.push({ code: lang, name: format.name ?? null, url: format.url, ext: format.ext, automatic: false });
    }
  }

  for (const [lang, formats] of Object.entries(automatic ?? {})) {
    if (!lang.endsWith("-orig")) continue;
    const format = pickCaptionFormat(formats);
    if (format) {
      const code = `a.${lang.slice(0, -"-orig".length)}`;
      tracks.push({ code, name: format.name ?? null, url: format.url, ext: format.ext, automatic: true });
    }
  }

  return tracks;
}

function toVideoRefs(entries: z.infer<typeof collectionSchema>["entries"]): VideoRef[] {
  const refs: VideoRef[] = [];
  for (const entry of entries ?? []) {
    if (!entry?.id || !VIDEO_ID.test(entry.id)) continue;
    refs.push({ watchUrl: `https://www.youtube.com/watch?v=${entry.id}`, title: entry.title ?? null });
  }
  return refs;
}

/**
 * Resolves title, duration, caption tracks and available formats.
 */
export async function fetchVideoMetadata(url: string): Promise<VideoMetadata> {
  console.log(`[yt-dlp] Fetching metadata: ${url}`);
  const metadata = await dumpJson(["--no-playlist", url], metadataSchema, "Metadata fetch failed");

  const formats: StreamFormat[] = [];
  for (const raw of metadata.formats ?? []) {
    const format = toStreamFormat(raw);
    if (format) formats.push(format);
  }

  return {
    externalId: metadata.id,
    title: metadata.title,
    durationSeconds: metadata.duration ?? 0,
    captions: toCaptionTracks(metadata.subtitles, metadata.automatic_captions),
    formats,
  };
}

/**
 * Downloads a single format to `<destDir>/<filename>` and returns the path.
 */
export async function downloadFormat(
  url: string,
  formatId: string,
  destDir: string,
  filename: string
): Promise<string> {
  await mkdir(destDir, { recursive: true });
  const outputPath = path.join(destDir, filename);

  console.log(`[yt-dlp] Downloading format ${formatId} → ${filename}`);
  await runYtDlp(
    ["-f", formatId, "--no-playlist", "--no-part", "--force-overwrites", "-o", outputPath, url],
    `Download of format ${formatId} failed`
  );

  if (!fs.existsSync(outputPath)) {
    throw new DownloadError("transient", `Download completed but file not found: ${outputPath}`);
  }
  return outputPath;
}

export async function fetchCaptionText(track: CaptionTrack): Promise<string> {
  const response = await fetch(track.url);
  if (!response.ok) {
    throw new DownloadError("transient", `Caption ${track.code} request failed: HTTP ${response.status}`);
  }
  return response.text();
}

export async function fetchPlaylist(url: string): Promise<VideoCollection> {
  console.log(`[yt-dlp] Listing playlist: ${url}`);
  const playlist = await dumpJson(["--flat-playlist", url], collectionSchema, "Playlist fetch failed");
  return {
    title: playlist.title ?? "playlist",
    videos: toVideoRefs(playlist.entries),
  };
}

/**
 * Lists a channel's uploads. A bare channel URL is pointed at its videos tab.
 */
export async function fetchChannel(url: string): Promise<VideoCollection> {
  const trimmed = url.replace(/\/+$/, "");
  const videosUrl = CHANNEL_TABS.test(trimmed) ? trimmed : `${trimmed}/videos`;

  console.log(`[yt-dlp] Listing channel: ${videosUrl}`);
  const channel = await dumpJson(["--flat-playlist", videosUrl], collectionSchema, "Channel fetch failed");
  return {
    title: channel.channel ?? channel.uploader ?? channel.title ?? "channel",
    videos: toVideoRefs(channel.entries),
  };
}

export async function searchVideos(query: string, options: SearchOptions): Promise<VideoRef[]> {
  const url = buildSearchUrl(query, options);
  console.log(`[yt-dlp] Searching "${query}" (${options.sortBy}, ${options.uploadDate}, ${options.type})`);

  const results = await dumpJson(
    ["--flat-playlist", "--playlist-end", String(options.limit), url],
    collectionSchema,
    "Search failed"
  );
  return toVideoRefs(results.entries).slice(0, options.limit);
}
