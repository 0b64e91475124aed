import type { BookmarkFolder } from "@skiff/schema";
import { BookmarkBook, DEFAULT_BOOKMARK_FOLDER } from "./bookmarks";

export const BOOKMARKS_FILE = "bookmarks.txt";
export const HISTORY_FILE = "history.txt";
export const PREFS_FILE = "prefs.json";

function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

function field(value: string): string {
  return value.replace(/[|\r\n]+/g, " ").trim();
}

// folder|title|url — the url keeps any further `|`.
export function encodeBookmarks(folders: readonly BookmarkFolder[]): string {
  let out = "";
  for (const folder of folders) {
    for (const b of folder.bookmarks) {
      out += `${field(folder.name)}|${field(b.title)}|${b.url.replace(/[\r\n]+/g, "")}\n`;
    }
  }
  return out;
}

export function decodeBookmarks(text: string): BookmarkFolder[] {
  const book = new BookmarkBook();
  for (const raw of splitLines(text)) {
    const line = raw.trim();
    if (!line) continue;
    const first = line.indexOf("|");
    if (first === -1) continue;
    const second = line.indexOf("|", first + 1);
    if (second === -1) {
      // title|url from the single-list format.
      book.add(DEFAULT_BOOKMARK_FOLDER, line.slice(0, first), line.slice(first + 1));
      continue;
    }
    book.add(line.slice(0, first), line.slice(first + 1, second), line.slice(second + 1));
  }
  return book.toFolders();
}

export function encodeHistory(urls: readonly string[]): string {
  return urls
    .map((u) => u.replace(/[\r\n]+/g, ""))
    .filter(Boolean)
    .map((u) => `${u}\n`)
    .join("");
}

export function decodeHistory(text: string): string[] {
  return splitLines(text)
    .map((l) => l.trim())
    .filter(Boolean);
}
