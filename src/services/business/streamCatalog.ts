/**
 * Stream Catalog
 * Filter/order/select over the formats reported for one video, plus the
 * video and audio selection chains used by the pipeline.
 */

import type { StreamOrderKey } from "../../config/downloader.js";
import type { StreamFormat } from "../external/ytdlp.js";

export interface StreamFilter {
  progressive?: boolean;
  mimeType?: string;
  resolution?: string;
  bitrate?: string;
  onlyAudio?: boolean;
  onlyVideo?: boolean;
  subtype?: string;
}

export interface VideoPreferences {
  mime: string;
  resolution: string;
  progressive: boolean;
  orderBy: StreamOrderKey;
}

export interface AudioPreferences {
  mime: string;
  bitrate: string;
}

const LEADING_DIGITS = /^\d+/;

/**
 * Numeric prefix first (ids without one sort last), then the whole id.
 * "18" < "140" < "140-drc" < "hls-720".
 */
export function compareFormatIds(a: string, b: string): number {
  const prefixA = LEADING_DIGITS.exec(a);
  const prefixB = LEADING_DIGITS.exec(b);
  const numberA = prefixA ? Number(prefixA[0]) : Number.POSITIVE_INFINITY;
  const numberB = prefixB ? Number(prefixB[0]) : Number.POSITIVE_INFINITY;

  if (numberA !== numberB) {
    return numberA < numberB ? -1 : 1;
  }
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function numericValue(format: StreamFormat, key: Exclude<StreamOrderKey, "formatId">): number {
  switch (key) {
    case "resolution":
      return format.height ?? 0;
    case "bitrate":
      return format.abr ?? 0;
    case "filesize":
      return format.filesize ?? 0;
  }
}

function compareFormats(a: StreamFormat, b: StreamFormat, key: StreamOrderKey): number {
  if (key === "formatId") {
    return compareFormatIds(a.formatId, b.formatId);
  }
  return numericValue(a, key) - numericValue(b, key);
}

function matches(format: StreamFormat, filter: StreamFilter): boolean {
  if (filter.progressive !== undefined && format.progressive !== filter.progressive) return false;
  if (filter.mimeType !== undefined && format.mimeType !== filter.mimeType) return false;
  if (filter.resolution !== undefined && format.resolution !== filter.resolution) return false;
  if (filter.bitrate !== undefined && format.bitrate !== filter.bitrate) return false;
  if (filter.subtype !== undefined && format.subtype !== filter.subtype) return false;
  if (filter.onlyAudio && (format.hasVideo || !format.hasAudio)) return false;
  if (filter.onlyVideo && (!format.hasVideo || format.hasAudio)) return false;
  return true;
}

/**
 * Immutable query over a list of formats; every method returns a new catalog.
 */
export class StreamCatalog {
  constructor(readonly formats: readonly StreamFormat[]) {}

  get size(): number {
    return this.formats.length;
  }

  filter(filter: StreamFilter): StreamCatalog {
    return new StreamCatalog(this.formats.filter((f) => matches(f, filter)));
  }

  orderBy(key: StreamOrderKey): StreamCatalog {
    const sorted = [...this.formats].sort((a, b) => compareFormats(a, b, key));
    return new StreamCatalog(sorted);
  }

  asc(): StreamCatalog {
    return this;
  }

  desc(): StreamCatalog {
    return new StreamCatalog([...this.formats].reverse());
  }

  first(): StreamFormat | null {
    return this.formats[0] ?? null;
  }

  last(): StreamFormat | null {
    return this.formats[this.formats.length - 1] ?? null;
  }

  /** Tallest video stream with the given progressive flag. */
  highestResolution(progressive: boolean): StreamFormat | null {
    const videos = this.formats.filter((f) => f.hasVideo && f.progressive === progressive);
    return new StreamCatalog(videos).orderBy("resolution").last();
  }

  /** Best audio-only stream, optionally restricted to one container subtype. */
  audioOnly(subtype?: string): StreamFormat | null {
    return this.filter({ onlyAudio: true, subtype }).orderBy("bitrate").last();
  }
}

/**
 * Preferred stream first; otherwise the highest resolution with the same
 * progressive flag. Null when neither exists.
 */
export function selectVideoStream(catalog: StreamCatalog, prefs: VideoPreferences): StreamFormat | null {
  const preferred = catalog
    .filter({
      progressive: prefs.progressive,
      mimeType: `video/${prefs.mime}`,
      resolution: prefs.resolution,
    })
    .orderBy(prefs.orderBy)
    .desc()
    .last();

  return preferred ?? catalog.highestResolution(prefs.progressive);
}

/**
 * Requested mime and bitrate; then the best audio-only stream in the preferred
 * container; then the best audio-only stream of any container.
 */
export function selectAudioStream(catalog: StreamCatalog, prefs: AudioPreferences): StreamFormat | null {
  return (
    catalog
      .filter({ mimeType: `audio/${prefs.mime}`, bitrate: prefs.bitrate })
      .asc()
      .first() ??
    catalog.audioOnly(prefs.mime) ??
    catalog.audioOnly()
  );
}
