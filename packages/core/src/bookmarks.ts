import type { Bookmark, BookmarkFolder } from "@skiff/schema";

export const DEFAULT_BOOKMARK_FOLDER = "Bookmarks";
export const CREATE_FOLDER_CHOICE = "➕ Create new folder";

/**
 * Bookmarks grouped by folder name. Folders keep the order they were first
 * created in; entries keep the order they were added in.
 */
export class BookmarkBook {
  private readonly folders = new Map<string, Bookmark[]>();

  static fromFolders(folders: readonly BookmarkFolder[]): BookmarkBook {
    const book = new BookmarkBook();
    for (const folder of folders) {
      for (const b of folder.bookmarks) book.add(folder.name, b.title, b.url);
    }
    return book;
  }

  /** Returns false when the folder name is blank or the URL is already filed there. */
  add(folder: string, title: string, url: string): boolean {
    const name = folder.trim();
    if (!name || !url) return false;
    const entries = this.folders.get(name) ?? [];
    if (entries.some((b) => b.url === url)) return false;
    entries.push({ title: title.trim() || url, url });
    this.folders.set(name, entries);
    return true;
  }

  remove(folder: string, url: string): boolean {
    const entries = this.folders.get(folder);
    if (!entries) return false;
    const kept = entries.filter((b) => b.url !== url);
    if (kept.length === entries.length) return false;
    if (kept.length === 0) this.folders.delete(folder);
    else this.folders.set(folder, kept);
    return true;
  }

  folderNames(): string[] {
    return [...this.folders.keys()];
  }

  toFolders(): BookmarkFolder[] {
    return [...this.folders.entries()].map(([name, bookmarks]) => ({
      name,
      bookmarks: bookmarks.map((b) => ({ ...b }))
    }));
  }
}

/** Choices offered when filing a bookmark; empty means "ask for a new folder name". */
export function folderChoices(folders: readonly string[]): string[] {
  if (folders.length === 0) return [];
  return [...folders, CREATE_FOLDER_CHOICE];
}
