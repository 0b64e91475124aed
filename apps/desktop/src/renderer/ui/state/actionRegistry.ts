import type { BookmarkFolder } from "@skiff/schema";
import { historyMenuEntries, shortcutLabel, type ShortcutCommand } from "@skiff/core";

export type MenuGroupId = "file" | "bookmarks" | "history" | "view";

export type MenuCommand =
  | { type: "tab.new" }
  | { type: "tab.close" }
  | { type: "bookmark.add" }
  | { type: "bookmark.open"; url: string }
  | { type: "bookmark.remove"; folder: string; url: string }
  | { type: "history.open"; url: string }
  | { type: "history.clear" }
  | { type: "theme.toggle" };

export type MenuEntry =
  | {
      kind: "action";
      id: string;
      label: string;
      command: MenuCommand;
      shortcut?: string;
      testId: string;
    }
  | { kind: "separator"; id: string }
  | { kind: "submenu"; id: string; label: string; entries: MenuEntry[]; testId: string };

export const MENU_GROUP_ORDER: MenuGroupId[] = ["file", "bookmarks", "history", "view"];

export const MENU_GROUP_LABELS: Record<MenuGroupId, string> = {
  file: "File",
  bookmarks: "Bookmarks",
  history: "History",
  view: "View"
};

function shortcut(command: ShortcutCommand): { shortcut?: string } {
  const label = shortcutLabel(command);
  return label ? { shortcut: label } : {};
}

function slug(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function fileMenu(): MenuEntry[] {
  return [
    {
      kind: "action",
      id: "file.new_tab",
      label: "New Tab",
      command: { type: "tab.new" },
      testId: "menu-file-new-tab",
      ...shortcut("tab.new")
    },
    {
      kind: "action",
      id: "file.close_tab",
      label: "Close Tab",
      command: { type: "tab.close" },
      testId: "menu-file-close-tab",
      ...shortcut("tab.close")
    }
  ];
}

export function bookmarksMenu(folders: readonly BookmarkFolder[]): MenuEntry[] {
  const entries: MenuEntry[] = [
    {
      kind: "action",
      id: "bookmarks.add",
      label: "Add Bookmark",
      command: { type: "bookmark.add" },
      testId: "menu-bookmarks-add",
      ...shortcut("bookmark.add")
    },
    { kind: "separator", id: "bookmarks.sep" }
  ];
  folders.forEach((folder, fi) => {
    const items: MenuEntry[] = [];
    folder.bookmarks.forEach((b, bi) => {
      items.push({
        kind: "action",
        id: `bookmarks.${fi}.${bi}.open`,
        label: b.title,
        command: { type: "bookmark.open", url: b.url },
        testId: `bookmark-open-${fi}-${bi}`
      });
      items.push({
        kind: "action",
        id: `bookmarks.${fi}.${bi}.remove`,
        label: `Remove '${b.title}'`,
        command: { type: "bookmark.remove", folder: folder.name, url: b.url },
        testId: `bookmark-remove-${fi}-${bi}`
      });
    });
    entries.push({
      kind: "submenu",
      id: `bookmarks.${fi}`,
      label: folder.name,
      entries: items,
      testId: `bookmark-folder-${slug(folder.name) || fi}`
    });
  });
  return entries;
}

export function historyMenu(visited: readonly string[]): MenuEntry[] {
  const entries: MenuEntry[] = historyMenuEntries(visited).map((url, i): MenuEntry => ({
    kind: "action",
    id: `history.${i}`,
    label: url,
    command: { type: "history.open", url },
    testId: `history-entry-${i}`
  }));
  if (entries.length > 0) entries.push({ kind: "separator", id: "history.sep" });
  entries.push({
    kind: "action",
    id: "history.clear",
    label: "Clear History",
    command: { type: "history.clear" },
    testId: "menu-history-clear"
  });
  return entries;
}

export function viewMenu(mode: "light" | "dark"): MenuEntry[] {
  return [
    {
      kind: "action",
      id: "view.theme",
      label: mode === "dark" ? "Light Mode" : "Dark Mode",
      command: { type: "theme.toggle" },
      testId: "menu-view-theme"
    }
  ];
}
