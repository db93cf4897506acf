/**
 * FFmpeg Service
 * Probing, audio transcoding and video/audio muxing via fluent-ffmpeg.
 */

import ffmpeg from "fluent-ffmpeg";
import { rm } from "fs/promises";

if (process.env.FFMPEG_PATH) {
  ffmpeg.setFfmpegPath(process.env.FFMPEG_PATH);
}
if (process.env.FFPROBE_PATH) {
  ffmpeg.setFfprobePath(process.env.FFPROBE_PATH);
}

export interface MediaHandle {
  readonly path: string;
  readonly durationSeconds: number;
  readonly hasAudio: boolean;
  readonly hasVideo: boolean;
  readonly closed: boolean;
  /** Kills any command still reading this file. Safe to call twice. */
  close(): void;
}

export interface MuxOptions {
  /** null copies the video stream */
  videoCodec: string | null;
  /** null copies the audio stream */
  audioCodec: string | null;
  /** When set, audio is re-encoded here first, then muxed without re-encoding. */
  tempAudioPath?: string | null;
}

class MediaFile implements MediaHandle {
  private readonly running = new Set<ffmpeg.FfmpegCommand>();
  private isClosed = false;

  constructor(
    readonly path: string,
    readonly durationSeconds: number,
    readonly hasAudio: boolean,
    readonly hasVideo: boolean
  ) {}

  get closed(): boolean {
    return this.isClosed;
  }

  attach(command: ffmpeg.FfmpegCommand): void {
    if (this.isClosed) {
      throw new Error(`Media handle already closed: ${this.path}`);
    }
    this.running.add(command);
  }

  detach(command: ffmpeg.FfmpegCommand): void {
    this.running.delete(command);
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const command of this.running) {
      command.kill("SIGKILL");
    }
    this.running.clear();
  }
}

function probe(filePath: string): Promise<ffmpeg.FfprobeData> {
  return new Promise((resolve, reject) => {
    ffmpeg.ffprobe(filePath, (err: Error | null, metadata) => {
      if (err) return reject(err);
      resolve(metadata);
    });
  });
}

async function open(filePath: string): Promise<MediaFile> {
  const metadata = await probe(filePath);
  const streams = metadata.streams ?? [];
  const duration = metadata.format?.duration;

  return new MediaFile(
    filePath,
    typeof duration === "number" ? duration : 0,
    streams.some((s) => s.codec_type === "audio"),
    streams.some((s) => s.codec_type === "video")
  );
}

function toMediaFile(handle: MediaHandle): MediaFile {
  if (!(handle instanceof MediaFile)) {
    throw new Error(`Unsupported media handle for ${handle.path}`);
  }
  return handle;
}

/**
 * Runs `command` into `outputPath`, registering it on every input handle so
 * closing a handle aborts the command.
 */
function run(command: ffmpeg.FfmpegCommand, inputs: MediaFile[], outputPath: string, tag: string): Promise<void> {
  for (const input of inputs) {
    input.attach(command);
  }

  return new Promise<void>((resolve, reject) => {
    const release = () => inputs.forEach((input) => input.detach(command));

    command
      .on("start", (line: string) => console.log(`[ffmpeg] ${tag}: ${line}`))
      .on("end", () => {
        release();
        resolve();
      })
      .on("error", (err: Error) => {
        release();
        reject(err);
      })
      .outputOptions(["-y"])
      .save(outputPath);
  });
}

export async function openVideo(filePath: string): Promise<MediaHandle> {
  const handle = await open(filePath);
  if (!handle.hasVideo) {
    throw new Error(`No video stream in ${filePath}`);
  }
  return handle;
}

export async function openAudio(filePath: string): Promise<MediaHandle> {
  const handle = await open(filePath);
  if (!handle.hasAudio) {
    throw new Error(`No audio stream in ${filePath}`);
  }
  return handle;
}

/**
 * Writes the audio track of `handle` to `outputPath`.
 * Without a codec ffmpeg picks the encoder from the output extension.
 */
export async function writeAudio(handle: MediaHandle, outputPath: string, codec: string | null): Promise<void> {
  const input = toMediaFile(handle);
  if (!input.hasAudio) {
    throw new Error(`No audio stream in ${input.path}`);
  }

  const command = ffmpeg(input.path).noVideo();
  if (codec) command.audioCodec(codec);

  await run(command, [input], outputPath, "audio");
}

/**
 * Muxes the video stream of `video` with the audio stream of `audio`.
 */
export async function muxVideoAudio(
  video: MediaHandle,
  audio: MediaHandle,
  outputPath: string,
  options: MuxOptions
): Promise<void> {
  const videoFile = toMediaFile(video);
  const audioFile = toMediaFile(audio);

  let audioSource = audioFile.path;
  let audioCodec = options.audioCodec ?? "copy";

  try {
    if (options.tempAudioPath) {
      await writeAudio(audioFile, options.tempAudioPath, options.audioCodec);
      audioSource = options.tempAudioPath;
      audioCodec = "copy";
    }

    const command = ffmpeg()
      .input(videoFile.path)
      .input(audioSource)
      .outputOptions(["-map 0:v:0", "-map 1:a:0", "-shortest"])
      .videoCodec(options.videoCodec ?? "copy")
      .audioCodec(audioCodec);

    await run(command, [videoFile, audioFile], outputPath, "mux");
  } finally {
    if (options.tempAudioPath) {
      await rm(options.tempAudioPath, { force: true });
    }
  }
}
