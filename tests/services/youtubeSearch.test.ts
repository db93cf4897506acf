import { describe, expect, it } from "vitest";
import { buildSearchUrl, encodeSearchFilters } from "../../src/services/external/youtubeSearch.js";

describe("encodeSearchFilters", () => {
  it("returns null when every filter is at its default", () => {
    expect(encodeSearchFilters({ sortBy: "relevance", uploadDate: "any", type: "any" })).toBeNull();
  });

  it("encodes the result type alone", () => {
    expect(encodeSearchFilters({ sortBy: "relevance", uploadDate: "any", type: "video" })).toBe("EgIQAQ==");
  });

  it("encodes the sort order alone", () => {
    expect(encodeSearchFilters({ sortBy: "view_count", uploadDate: "any", type: "any" })).toBe("CAM=");
  });

  it("combines sort order and nested filters", () => {
    expect(encodeSearchFilters({ sortBy: "upload_date", uploadDate: "this_week", type: "video" })).toBe(
      "CAISBAgDEAE="
    );
  });
});

describe("buildSearchUrl", () => {
  it("adds the encoded filters as sp", () => {
    expect(buildSearchUrl("learn english", { sortBy: "upload_date", uploadDate: "this_week", type: "video" })).toBe(
      "https://www.youtube.com/results?search_query=learn+english&sp=CAISBAgDEAE%3D"
    );
  });

  it("omits sp without filters", () => {
    expect(buildSearchUrl("cats", { sortBy: "relevance", uploadDate: "any", type: "any" })).toBe(
      "https://www.youtube.com/results?search_query=cats"
    );
  });
});
