import type { z } from "zod";
import {
  BookmarksAddParamsSchema,
  BookmarksRemoveParamsSchema,
  HistorySaveParamsSchema,
  PrefsSchema,
  PrefsUpdateParamsSchema,
  STORE_METHODS,
  type BookmarkFolder,
  type Prefs,
  type PrefsPatch,
  type StoreMethod,
  type StoreResponse
} from "@skiff/schema";
import { BookmarkBook } from "./bookmarks";
import {
  BOOKMARKS_FILE,
  HISTORY_FILE,
  PREFS_FILE,
  decodeBookmarks,
  decodeHistory,
  encodeBookmarks,
  encodeHistory
} from "./codec";
import { StoreError, toStoreError } from "./errors";

/** Whole-file text storage keyed by file name. A missing file reads as null. */
export interface TextFilePort {
  read(name: string): Promise<string | null>;
  write(name: string, text: string): Promise<void>;
}

const METHOD_NAMES: readonly string[] = STORE_METHODS;

export function isStoreMethod(method: string): method is StoreMethod {
  return METHOD_NAMES.includes(method);
}

function parseParams<T>(schema: z.ZodType<T>, params: unknown): T {
  const parsed = schema.safeParse(params ?? {});
  if (!parsed.success) {
    throw new StoreError("invalid_params", "invalid params", { issues: parsed.error.issues });
  }
  return parsed.data;
}

/**
 * Bookmarks, history and preferences of one profile, read and written as
 * whole text files through a {@link TextFilePort}.
 */
export class ProfileService {
  constructor(private readonly files: TextFilePort) {}

  async listBookmarks(): Promise<BookmarkFolder[]> {
    const text = await this.files.read(BOOKMARKS_FILE);
    return text === null ? [] : decodeBookmarks(text);
  }

  async addBookmark(folder: string, title: string, url: string) {
    const book = BookmarkBook.fromFolders(await this.listBookmarks());
    const added = book.add(folder, title, url);
    const folders = book.toFolders();
    if (added) await this.files.write(BOOKMARKS_FILE, encodeBookmarks(folders));
    return { added, folders };
  }

  async removeBookmark(folder: string, url: string) {
    const book = BookmarkBook.fromFolders(await this.listBookmarks());
    const removed = book.remove(folder, url);
    const folders = book.toFolders();
    if (removed) await this.files.write(BOOKMARKS_FILE, encodeBookmarks(folders));
    return { removed, folders };
  }

  async getHistory(): Promise<string[]> {
    const text = await this.files.read(HISTORY_FILE);
    return text === null ? [] : decodeHistory(text);
  }

  async saveHistory(urls: readonly string[]): Promise<number> {
    const text = encodeHistory(urls);
    await this.files.write(HISTORY_FILE, text);
    return decodeHistory(text).length;
  }

  async clearHistory(): Promise<void> {
    await this.files.write(HISTORY_FILE, "");
  }

  async getPrefs(): Promise<Prefs> {
    const text = await this.files.read(PREFS_FILE);
    if (text === null) return PrefsSchema.parse({});
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      return PrefsSchema.parse({});
    }
    const parsed = PrefsSchema.safeParse(raw);
    return parsed.success ? parsed.data : PrefsSchema.parse({});
  }

  async updatePrefs(patch: PrefsPatch): Promise<Prefs> {
    const current = await this.getPrefs();
    const next = PrefsSchema.parse({ ...current, ...stripUndefined(patch) });
    await this.files.write(PREFS_FILE, `${JSON.stringify(next, null, 2)}\n`);
    return next;
  }

  async dispatch(method: string, params: unknown): Promise<unknown> {
    if (!isStoreMethod(method)) {
      throw new StoreError("unknown_method", `unknown method: ${method}`, { method });
    }
    switch (method) {
      case "bookmarks.list":
        return { folders: await this.listBookmarks() };
      case "bookmarks.add": {
        const p = parseParams(BookmarksAddParamsSchema, params);
        return this.addBookmark(p.folder, p.title, p.url);
      }
      case "bookmarks.remove": {
        const p = parseParams(BookmarksRemoveParamsSchema, params);
        return this.removeBookmark(p.folder, p.url);
      }
      case "history.get":
        return { urls: await this.getHistory() };
      case "history.save": {
        const p = parseParams(HistorySaveParamsSchema, params);
        return { count: await this.saveHistory(p.urls) };
      }
      case "history.clear":
        await this.clearHistory();
        return { ok: true };
      case "prefs.get":
        return { prefs: await this.getPrefs() };
      case "prefs.update": {
        const p = parseParams(PrefsUpdateParamsSchema, params);
        return { prefs: await this.updatePrefs(p) };
      }
    }
  }

  /** Like {@link dispatch}, but every failure comes back as an error response. */
  async handle(id: string, method: string, params: unknown): Promise<StoreResponse> {
    try {
      const result = await this.dispatch(method, params);
      return { id, ok: true, result };
    } catch (e: unknown) {
      const err = toStoreError(e);
      return {
        id,
        ok: false,
        error: err.details
          ? { code: err.code, message: err.message, details: err.details }
          : { code: err.code, message: err.message }
      };
    }
  }
}

function stripUndefined(patch: PrefsPatch): Partial<Prefs> {
  const out: Partial<Prefs> = {};
  if (patch.theme !== undefined) out.theme = patch.theme;
  if (patch.homeUrl !== undefined) out.homeUrl = patch.homeUrl;
  if (patch.searchEngine !== undefined) out.searchEngine = patch.searchEngine;
  return out;
}
