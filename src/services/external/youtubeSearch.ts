/**
 * YouTube search URL builder.
 * Search filters travel in the `sp` query parameter as a base64 protobuf:
 * field 1 = sort order, field 2 = nested filter message
 * (1 = upload date, 2 = result type).
 */

export const SEARCH_SORT_OPTIONS = ["relevance", "rating", "upload_date", "view_count"] as const;
export const SEARCH_UPLOAD_DATES = ["any", "last_hour", "today", "this_week", "this_month", "this_year"] as const;
export const SEARCH_RESULT_TYPES = ["any", "video", "channel", "playlist", "movie"] as const;

export type SearchSortBy = (typeof SEARCH_SORT_OPTIONS)[number];
export type SearchUploadDate = (typeof SEARCH_UPLOAD_DATES)[number];
export type SearchResultType = (typeof SEARCH_RESULT_TYPES)[number];

export interface SearchFilters {
  sortBy: SearchSortBy;
  uploadDate: SearchUploadDate;
  type: SearchResultType;
}

/** Protobuf enum values; 0 means unset. */
const SORT_VALUES: Record<SearchSortBy, number> = {
  relevance: 0,
  rating: 1,
  upload_date: 2,
  view_count: 3,
};

const UPLOAD_DATE_VALUES: Record<SearchUploadDate, number> = {
  any: 0,
  last_hour: 1,
  today: 2,
  this_week: 3,
  this_month: 4,
  this_year: 5,
};

const TYPE_VALUES: Record<SearchResultType, number> = {
  any: 0,
  video: 1,
  channel: 2,
  playlist: 3,
  movie: 4,
};

/**
 * Encodes the filters into the `sp` value, or null when every filter is at its default.
 */
export function encodeSearchFilters(filters: SearchFilters): string | null {
  const nested: number[] = [];
  const uploadDate = UPLOAD_DATE_VALUES[filters.uploadDate];
  const type = TYPE_VALUES[filters.type];
  if (uploadDate > 0) nested.push(0x08, uploadDate);
  if (type > 0) nested.push(0x10, type);

  const bytes: number[] = [];
  const sort = SORT_VALUES[filters.sortBy];
  if (sort > 0) bytes.push(0x08, sort);
  if (nested.length > 0) bytes.push(0x12, nested.length, ...nested);

  if (bytes.length === 0) {
    return null;
  }
  return Buffer.from(bytes).toString("base64");
}

export function buildSearchUrl(query: string, filters: SearchFilters): string {
  const url = new URL("https://www.youtube.com/results");
  url.searchParams.set("search_query", query);
  const sp = encodeSearchFilters(filters);
  if (sp) {
    url.searchParams.set("sp", sp);
  }
  return url.toString();
}
