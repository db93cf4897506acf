import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadSources, parseSources } from "../../src/config/sources.js";
import { ConfigError } from "../../src/utils/errors.js";

describe("parseSources", () => {
  it("fills defaults for missing sections and search options", () => {
    const sources = parseSources({
      videos: ["https://youtu.be/ABC12345678"],
      searches: [{ query: "  lofi beats  " }],
    });

    expect(sources).toEqual({
      videos: ["https://youtu.be/ABC12345678"],
      playlists: [],
      channels: [],
      searches: [{ query: "lofi beats", sortBy: "relevance", uploadDate: "any", type: "video", limit: 5 }],
    });
  });

  it("rejects invalid entries", () => {
    expect(() => parseSources({ playlists: ["not a url"] })).toThrow(ConfigError);
    expect(() => parseSources({ playlists: ["not a url"] })).toThrow(/playlists\.0/);
    expect(() => parseSources({ searches: [{ query: "x", sortBy: "newest" }] })).toThrow(/searches\.0\.sortBy/);
    expect(() => parseSources({ searches: [{ query: "x", limit: 0 }] })).toThrow(/limit/);
  });
});

describe("loadSources", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "tube-archiver-sources-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads a JSON file", async () => {
    const file = path.join(dir, "sources.json");
    await writeFile(file, JSON.stringify({ channels: ["https://www.youtube.com/@example"] }));

    const sources = await loadSources(file);
    expect(sources.channels).toEqual(["https://www.youtube.com/@example"]);
  });

  it("reports invalid JSON as a configuration error", async () => {
    const file = path.join(dir, "broken.json");
    await writeFile(file, "{ videos: ");

    await expect(loadSources(file)).rejects.toBeInstanceOf(ConfigError);
  });
});
