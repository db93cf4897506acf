import { mkdir, mkdtemp, readdir, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { DownloaderSettings } from "../../src/config/downloader.js";
import { parseSources } from "../../src/config/sources.js";
import {
  mergeSummaries,
  processPlaylist,
  processVideoList,
  runSources,
} from "../../src/jobs/orchestrators/batchOrchestrator.js";
import { memoryTaskRepository } from "../helpers/memoryTaskRepository.js";
import { fakeFfmpeg, fakeYouTube, readMediaFile, writeMediaFile } from "../helpers/fakeMedia.js";
import { testSettings } from "../helpers/settings.js";

vi.mock("../../src/repositories/taskRepository.js", async (importOriginal) => {
  const { mockTaskRepositoryModule } = await import("../helpers/memoryTaskRepository.js");
  return mockTaskRepositoryModule(await importOriginal<object>());
});
vi.mock("../../src/services/external/ytdlp.js", async () => (await import("../helpers/fakeMedia.js")).fakeYouTube.module());
vi.mock("../../src/services/external/ffmpeg.js", async () => (await import("../helpers/fakeMedia.js")).fakeFfmpeg.module());

const SONG_URL = "https://www.youtube.com/watch?v=AAAAAAAAAAA";
const RAIN_URL = "https://www.youtube.com/watch?v=DDDDDDDDDDD";
const REMOVED_URL = "https://www.youtube.com/watch?v=CCCCCCCCCCC";

let baseDir: string;
let settings: DownloaderSettings;

beforeEach(async () => {
  memoryTaskRepository.reset();
  fakeYouTube.reset();
  fakeFfmpeg.reset();
  vi.clearAllMocks();

  baseDir = await mkdtemp(path.join(os.tmpdir(), "tube-archiver-batch-"));
  settings = testSettings(baseDir);
  fakeYouTube.addVideo({ id: "AAAAAAAAAAA", title: "My Song" });
  fakeYouTube.addVideo({ id: "DDDDDDDDDDD", title: "Rain" });
});

afterEach(async () => {
  await rm(baseDir, { recursive: true, force: true });
});

describe("processVideoList", () => {
  it("continues after a failed item", async () => {
    fakeYouTube.metadataFailures.set(
      "CCCCCCCCCCC",
      new Error("ERROR: [youtube] CCCCCCCCCCC: This video has been removed by the uploader")
    );

    const summary = await processVideoList([REMOVED_URL, SONG_URL], { settings });

    expect(summary).toEqual({ total: 2, completed: 1, skipped: 0, failed: 1, cancelled: 0 });
    expect(memoryTaskRepository.get("CCCCCCCCCCC")?.status).toBe("failed");
    expect(memoryTaskRepository.get("AAAAAAAAAAA")?.status).toBe("completed");
  });

  it("accepts search results as references", async () => {
    const summary = await processVideoList([{ watchUrl: RAIN_URL, title: "Rain" }], { settings });

    expect(summary.completed).toBe(1);
    expect(memoryTaskRepository.get("DDDDDDDDDDD")?.final_video_name).toBe("Rain.mp4");
  });

  it("skips completed tasks", async () => {
    memoryTaskRepository.seed({ external_id: "AAAAAAAAAAA", status: "completed" });

    const summary = await processVideoList([SONG_URL], { settings });

    expect(summary).toEqual({ total: 1, completed: 0, skipped: 1, failed: 0, cancelled: 0 });
    expect(fakeYouTube.networkCalls()).toBe(0);
  });

  it("completes a named task whose files are already on disk without fetching", async () => {
    memoryTaskRepository.seed({
      external_id: "AAAAAAAAAAA",
      final_video_name: "My_Song.mp4",
      final_audio_name: "My_Song.mp3",
      status: "failed",
    });
    await mkdir(settings.videoDir, { recursive: true });
    await mkdir(settings.audioDir, { recursive: true });
    await writeMediaFile(path.join(settings.videoDir, "My_Song.mp4"), { video: true, audio: true, origin: "mux" });
    await writeMediaFile(path.join(settings.audioDir, "My_Song.mp3"), { video: false, audio: true, origin: "140" });

    const summary = await processVideoList([SONG_URL], { settings });

    expect(summary.completed).toBe(1);
    expect(fakeYouTube.fetchVideoMetadata).not.toHaveBeenCalled();
    const task = memoryTaskRepository.get("AAAAAAAAAAA");
    expect(task?.status).toBe("completed");
    expect(task?.video_path).toBe(path.join(settings.videoDir, "My_Song.mp4"));
    expect(task?.audio_hash).toMatch(/^[0-9a-f]{64}$/);
    expect(task?.merged_path).toBeNull();
  });

  it("finalizes without opening the video when merging is disabled", async () => {
    const noMerge = testSettings(baseDir, { MERGE_MEDIA: "false" });
    memoryTaskRepository.seed({
      external_id: "AAAAAAAAAAA",
      final_video_name: "My_Song.mp4",
      final_audio_name: "My_Song.mp3",
      status: "failed",
    });
    await mkdir(noMerge.videoDir, { recursive: true });
    await mkdir(noMerge.audioDir, { recursive: true });
    await writeFile(path.join(noMerge.videoDir, "My_Song.mp4"), "video");
    await writeFile(path.join(noMerge.audioDir, "My_Song.mp3"), "audio");

    const summary = await processVideoList([SONG_URL], { settings: noMerge });

    expect(summary.completed).toBe(1);
    expect(fakeFfmpeg.openVideo).not.toHaveBeenCalled();
    expect(fakeYouTube.fetchVideoMetadata).not.toHaveBeenCalled();
  });

  it("finishes a merge that failed on an earlier run", async () => {
    fakeFfmpeg.muxFailure = new Error("ffmpeg exited with code 1: Conversion failed!");
    const first = await processVideoList([SONG_URL], { settings });

    expect(first.failed).toBe(1);
    expect(memoryTaskRepository.get("AAAAAAAAAAA")?.status).toBe("failed");
    expect(await readMediaFile(path.join(settings.videoDir, "My_Song.mp4"))).toMatchObject({ audio: false });

    fakeFfmpeg.muxFailure = null;
    vi.clearAllMocks();
    const second = await processVideoList([SONG_URL], { settings });

    expect(second).toEqual({ total: 1, completed: 1, skipped: 0, failed: 0, cancelled: 0 });
    expect(fakeFfmpeg.muxVideoAudio).toHaveBeenCalledTimes(1);
    expect(fakeYouTube.downloadFormat).not.toHaveBeenCalled();
    expect(await readMediaFile(path.join(settings.videoDir, "My_Song.mp4"))).toEqual({
      video: true,
      audio: true,
      origin: "mux",
    });
    expect(memoryTaskRepository.get("AAAAAAAAAAA")?.status).toBe("completed");
  });

  it("runs the merge when the kept original has no merged copy yet", async () => {
    const keepOriginal = testSettings(baseDir, { KEEP_ORIGINAL_VIDEO: "true" });
    memoryTaskRepository.seed({
      external_id: "AAAAAAAAAAA",
      final_video_name: "My_Song.mp4",
      final_audio_name: "My_Song.mp3",
      status: "failed",
    });
    await mkdir(keepOriginal.videoDir, { recursive: true });
    await mkdir(keepOriginal.audioDir, { recursive: true });
    await writeMediaFile(path.join(keepOriginal.videoDir, "My_Song.mp4"), { video: true, audio: false, origin: "137" });
    await writeMediaFile(path.join(keepOriginal.audioDir, "My_Song.mp3"), { video: false, audio: true, origin: "140" });

    const summary = await processVideoList([SONG_URL], { settings: keepOriginal });

    expect(summary.completed).toBe(1);
    expect(fakeFfmpeg.muxVideoAudio).toHaveBeenCalledTimes(1);
    const task = memoryTaskRepository.get("AAAAAAAAAAA");
    expect(task?.merged_path).toBe(path.join(keepOriginal.videoDir, "My_Song.merged.mp4"));
    expect(task?.merged_hash).toMatch(/^[0-9a-f]{64}$/);
  });

  it("runs the full workflow when only some outputs exist", async () => {
    memoryTaskRepository.seed({
      external_id: "AAAAAAAAAAA",
      final_video_name: "My_Song.mp4",
      final_audio_name: "My_Song.mp3",
      status: "failed",
    });
    await mkdir(settings.videoDir, { recursive: true });
    await writeFile(path.join(settings.videoDir, "My_Song.mp4"), JSON.stringify({ video: true, audio: false, origin: "137" }));

    const summary = await processVideoList([SONG_URL], { settings });

    expect(summary.completed).toBe(1);
    expect(fakeYouTube.fetchVideoMetadata).toHaveBeenCalledTimes(1);
    expect(fakeYouTube.downloadFormat.mock.calls.map((call) => call[1])).toEqual(["140"]);
  });

  it("counts dry-run items as skipped", async () => {
    const summary = await processVideoList([SONG_URL], { settings: testSettings(baseDir, { DRY_RUN: "true" }) });

    expect(summary).toEqual({ total: 1, completed: 0, skipped: 1, failed: 0, cancelled: 0 });
  });

  it("counts every remaining item as cancelled when aborted up front", async () => {
    const controller = new AbortController();
    controller.abort();

    const summary = await processVideoList([SONG_URL, RAIN_URL], { settings, signal: controller.signal });

    expect(summary).toEqual({ total: 0, completed: 0, skipped: 0, failed: 0, cancelled: 2 });
    expect(fakeYouTube.networkCalls()).toBe(0);
  });

  it("finishes the current item and stops when aborted mid-run", async () => {
    const controller = new AbortController();
    fakeYouTube.onMetadata = () => controller.abort();

    const summary = await processVideoList([SONG_URL, RAIN_URL], { settings, signal: controller.signal });

    expect(summary).toEqual({ total: 1, completed: 1, skipped: 0, failed: 0, cancelled: 1 });
    expect(memoryTaskRepository.get("DDDDDDDDDDD")).toBeUndefined();
  });

  it("reports bot detection with guidance", async () => {
    fakeYouTube.metadataFailures.set(
      "BBBBBBBBBBB",
      new Error("ERROR: [youtube] BBBBBBBBBBB: Sign in to confirm you're not a bot")
    );
    const url = "https://www.youtube.com/watch?v=BBBBBBBBBBB";

    const summary = await processVideoList([url], { settings });

    expect(summary.failed).toBe(1);
    expect(fakeYouTube.fetchVideoMetadata).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledWith(
      `[batch] ✗ Bot detection triggered for ${url}. Provide cookies (YOUTUBE_COOKIES_PATH) or slow down.`
    );
  });

  it("counts an unresolvable reference as failed", async () => {
    const summary = await processVideoList(["https://example.com/not-a-video"], { settings });

    expect(summary).toEqual({ total: 1, completed: 0, skipped: 0, failed: 1, cancelled: 0 });
  });
});

describe("processPlaylist", () => {
  it("writes into the playlist's own directories", async () => {
    const playlistUrl = "https://www.youtube.com/playlist?list=PLroadtrip";
    fakeYouTube.playlists.set(playlistUrl, {
      title: "Road Trip",
      videos: [{ watchUrl: SONG_URL, title: "My Song" }],
    });

    const summary = await processPlaylist(playlistUrl, { settings });

    expect(summary.completed).toBe(1);
    expect(await readdir(path.join(baseDir, "Road_Trip"))).toEqual(["My_Song.mp4"]);
    expect(await readdir(path.join(baseDir, "Road_Trip-Audio"))).toEqual(["My_Song.mp3"]);
    expect(memoryTaskRepository.get("AAAAAAAAAAA")?.audio_path).toBe(
      path.join(baseDir, "Road_Trip-Audio", "My_Song.mp3")
    );
  });
});

describe("runSources", () => {
  it("processes every enabled section and skips failing collections", async () => {
    fakeYouTube.searchResults = [{ watchUrl: RAIN_URL, title: "Rain" }];
    const sources = parseSources({
      videos: [SONG_URL],
      playlists: ["https://www.youtube.com/playlist?list=PLmissing"],
      channels: ["https://www.youtube.com/@disabled"],
      searches: [{ query: "rain sounds" }],
    });

    const summary = await runSources(sources, { settings: testSettings(baseDir, { ENABLE_CHANNELS: "false" }) });

    expect(summary).toEqual({ total: 2, completed: 2, skipped: 0, failed: 0, cancelled: 0 });
    expect(fakeYouTube.fetchPlaylist).toHaveBeenCalledTimes(1);
    expect(fakeYouTube.fetchChannel).not.toHaveBeenCalled();
    expect(fakeYouTube.searchVideos).toHaveBeenCalledWith("rain sounds", {
      sortBy: "relevance",
      uploadDate: "any",
      type: "video",
      limit: 5,
    });
  });

  it("stops before later sections once aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const sources = parseSources({ playlists: ["https://www.youtube.com/playlist?list=PLroadtrip"] });

    const summary = await runSources(sources, { settings, signal: controller.signal });

    expect(summary.total).toBe(0);
    expect(fakeYouTube.fetchPlaylist).not.toHaveBeenCalled();
  });
});

describe("mergeSummaries", () => {
  it("adds every counter", () => {
    expect(
      mergeSummaries(
        { total: 2, completed: 1, skipped: 1, failed: 0, cancelled: 0 },
        { total: 3, completed: 0, skipped: 0, failed: 2, cancelled: 4 }
      )
    ).toEqual({ total: 5, completed: 1, skipped: 1, failed: 2, cancelled: 4 });
  });
});
