import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  auditPlaylistDuplicates,
  auditPlaylistFiles,
  findDuplicateContent,
  findDuplicateTitles,
  findMissingTitles,
  findUnpairedVideos,
} from "../../src/services/business/reconciliationService.js";
import { fakeYouTube } from "../helpers/fakeMedia.js";
import { memoryTaskRepository } from "../helpers/memoryTaskRepository.js";
import { testSettings } from "../helpers/settings.js";

vi.mock("../../src/services/external/ytdlp.js", async () => (await import("../helpers/fakeMedia.js")).fakeYouTube.module());

const PLAYLIST_URL = "https://www.youtube.com/playlist?list=PLroadtrip";

let baseDir: string;

beforeEach(async () => {
  fakeYouTube.reset();
  memoryTaskRepository.reset();
  vi.clearAllMocks();
  baseDir = await mkdtemp(path.join(os.tmpdir(), "tube-archiver-audit-"));
});

afterEach(async () => {
  await rm(baseDir, { recursive: true, force: true });
});

describe("findDuplicateTitles", () => {
  it("reports titles that normalize to an earlier one", () => {
    expect(findDuplicateTitles(["Intro: Part 1", "Intro Part 1", "Outro"], 63)).toEqual(["Intro Part 1"]);
  });

  it("reports every repeat after the first", () => {
    expect(findDuplicateTitles(["Song", "Song", "Song?"], 63)).toEqual(["Song", "Song?"]);
  });

  it("returns nothing for distinct titles", () => {
    expect(findDuplicateTitles(["One", "Two"], 63)).toEqual([]);
  });
});

describe("findMissingTitles", () => {
  it("compares against the larger on-disk set", () => {
    const missing = findMissingTitles(
      ["My Song", "Rain", "Intro: Part 1"],
      ["My_Song", "Intro_Part_1"],
      ["My_Song"],
      63
    );

    expect(missing).toEqual([{ title: "Rain", normalized: "Rain" }]);
  });

  it("uses the audio names when there are more of them", () => {
    const missing = findMissingTitles(["My Song", "Rain"], [], ["My_Song", "Rain"], 63);

    expect(missing).toEqual([]);
  });
});

describe("findUnpairedVideos", () => {
  it("lists videos without a matching audio file", async () => {
    const videoDir = path.join(baseDir, "video");
    const audioDir = path.join(baseDir, "audio");
    await mkdir(videoDir);
    await mkdir(audioDir);
    await writeFile(path.join(videoDir, "a.mp4"), "");
    await writeFile(path.join(videoDir, "b.mp4"), "");
    await writeFile(path.join(videoDir, "b.mp4.en.txt"), "");
    await writeFile(path.join(audioDir, "a.mp3"), "");

    expect(await findUnpairedVideos(videoDir, audioDir, "mp4", "mp3")).toEqual(["b"]);
  });

  it("treats a missing audio directory as empty", async () => {
    const videoDir = path.join(baseDir, "video");
    await mkdir(videoDir);
    await writeFile(path.join(videoDir, "a.mp4"), "");

    expect(await findUnpairedVideos(videoDir, path.join(baseDir, "nope"), "mp4", "mp3")).toEqual(["a"]);
  });
});

describe("findDuplicateContent", () => {
  it("groups completed tasks by digest", () => {
    const tasks = [
      memoryTaskRepository.seed({ external_id: "vid11111111", status: "completed", video_hash: "h1", audio_hash: "h2" }),
      memoryTaskRepository.seed({ external_id: "vid22222222", status: "completed", video_hash: "h1", audio_hash: "h3" }),
      memoryTaskRepository.seed({ external_id: "vid33333333", status: "failed", video_hash: "h1", audio_hash: "h2" }),
    ];

    expect(findDuplicateContent(tasks)).toEqual([
      { kind: "video", hash: "h1", externalIds: ["vid11111111", "vid22222222"] },
    ]);
  });
});

describe("playlist audits", () => {
  beforeEach(() => {
    fakeYouTube.playlists.set(PLAYLIST_URL, {
      title: "Road Trip",
      videos: [
        { watchUrl: "https://www.youtube.com/watch?v=AAAAAAAAAAA", title: "My Song" },
        { watchUrl: "https://www.youtube.com/watch?v=DDDDDDDDDDD", title: "Rain" },
        { watchUrl: "https://www.youtube.com/watch?v=EEEEEEEEEEE", title: "My Song!" },
        { watchUrl: "https://www.youtube.com/watch?v=FFFFFFFFFFF", title: null },
      ],
    });
  });

  it("reports playlist titles missing from the collection directories", async () => {
    const settings = testSettings(baseDir);
    await mkdir(path.join(baseDir, "Road_Trip"));
    await mkdir(path.join(baseDir, "Road_Trip-Audio"));
    await writeFile(path.join(baseDir, "Road_Trip", "My_Song.mp4"), "");
    await writeFile(path.join(baseDir, "Road_Trip-Audio", "My_Song.mp3"), "");

    const audit = await auditPlaylistFiles(PLAYLIST_URL, settings);

    expect(audit).toEqual({
      playlistTitle: "Road Trip",
      videoDir: path.join(baseDir, "Road_Trip"),
      audioDir: path.join(baseDir, "Road_Trip-Audio"),
      expected: 3,
      videoFiles: 1,
      audioFiles: 1,
      missing: [
        { title: "Rain", normalized: "Rain" },
        { title: "My Song!", normalized: "My_Song!" },
      ],
    });
  });

  it("reports duplicated playlist titles", async () => {
    fakeYouTube.playlists.set(PLAYLIST_URL, {
      title: "Road Trip",
      videos: [
        { watchUrl: "https://www.youtube.com/watch?v=AAAAAAAAAAA", title: "Intro: Part 1" },
        { watchUrl: "https://www.youtube.com/watch?v=DDDDDDDDDDD", title: "Intro Part 1" },
      ],
    });

    const audit = await auditPlaylistDuplicates(PLAYLIST_URL, testSettings(baseDir));

    expect(audit).toEqual({ playlistTitle: "Road Trip", duplicates: ["Intro Part 1"] });
  });

  it("propagates a playlist that cannot be read", async () => {
    await expect(
      auditPlaylistFiles("https://www.youtube.com/playlist?list=PLmissing", testSettings(baseDir))
    ).rejects.toThrow("The playlist does not exist");
  });
});
