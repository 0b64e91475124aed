import { z } from "zod";

export const StoreRequestSchema = z.object({
  id: z.string(),
  method: z.string(),
  params: z.record(z.string(), z.unknown()).optional()
});

export type StoreRequest = z.infer<typeof StoreRequestSchema>;

export const StoreOkResponseSchema = z.object({
  id: z.string(),
  ok: z.literal(true),
  result: z.unknown()
});

export const StoreErrResponseSchema = z.object({
  id: z.string(),
  ok: z.literal(false),
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.record(z.string(), z.unknown()).optional()
  })
});

export const StoreResponseSchema = z.union([StoreOkResponseSchema, StoreErrResponseSchema]);

export type StoreResponse = z.infer<typeof StoreResponseSchema>;

// Persisted shapes.

export const BookmarkSchema = z.object({
  title: z.string(),
  url: z.string()
});

export type Bookmark = z.infer<typeof BookmarkSchema>;

export const BookmarkFolderSchema = z.object({
  name: z.string(),
  bookmarks: z.array(BookmarkSchema)
});

export type BookmarkFolder = z.infer<typeof BookmarkFolderSchema>;

export const ThemePreferenceSchema = z.enum(["light", "dark", "system"]);

export type ThemePreference = z.infer<typeof ThemePreferenceSchema>;

export const SearchEngineIdSchema = z.enum(["duckduckgo", "google", "bing"]);

export type SearchEngineId = z.infer<typeof SearchEngineIdSchema>;

export const DEFAULT_HOME_URL = "https://duckduckgo.com";

export const PrefsSchema = z.object({
  theme: ThemePreferenceSchema.default("system"),
  homeUrl: z.string().min(1).default(DEFAULT_HOME_URL),
  searchEngine: SearchEngineIdSchema.default("duckduckgo")
});

export type Prefs = z.infer<typeof PrefsSchema>;

// Store method params (validated by the service before it touches files).

export const BookmarksAddParamsSchema = z.object({
  folder: z.string(),
  title: z.string(),
  url: z.string().min(1)
});

export const BookmarksRemoveParamsSchema = z.object({
  folder: z.string(),
  url: z.string()
});

export const HistorySaveParamsSchema = z.object({
  urls: z.array(z.string())
});

export const PrefsUpdateParamsSchema = z.object({
  theme: ThemePreferenceSchema.optional(),
  homeUrl: z.string().min(1).optional(),
  searchEngine: SearchEngineIdSchema.optional()
});

export type PrefsPatch = z.infer<typeof PrefsUpdateParamsSchema>;

// Store `result` payload schemas (renderer validates these).

export const BookmarksListResultSchema = z.object({
  folders: z.array(BookmarkFolderSchema)
});

export const BookmarksAddResultSchema = z.object({
  added: z.boolean(),
  folders: z.array(BookmarkFolderSchema)
});

export const BookmarksRemoveResultSchema = z.object({
  removed: z.boolean(),
  folders: z.array(BookmarkFolderSchema)
});

export const HistoryGetResultSchema = z.object({
  urls: z.array(z.string())
});

export const HistorySaveResultSchema = z.object({
  count: z.number().int().nonnegative()
});

export const HistoryClearResultSchema = z.object({
  ok: z.literal(true)
});

export const PrefsGetResultSchema = z.object({
  prefs: PrefsSchema
});

export const PrefsUpdateResultSchema = z.object({
  prefs: PrefsSchema
});

export const STORE_METHODS = [
  "bookmarks.list",
  "bookmarks.add",
  "bookmarks.remove",
  "history.get",
  "history.save",
  "history.clear",
  "prefs.get",
  "prefs.update"
] as const;

export type StoreMethod = (typeof STORE_METHODS)[number];
