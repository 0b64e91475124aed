import { describe, expect, test } from "vitest";
import { ProfileService, type TextFilePort } from "../profile";
import { DEFAULT_HOME_URL } from "@skiff/schema";

class MemoryFiles implements TextFilePort {
  readonly files = new Map<string, string>();

  async read(name: string): Promise<string | null> {
    return this.files.get(name) ?? null;
  }

  async write(name: string, text: string): Promise<void> {
    this.files.set(name, text);
  }
}

describe("profile service", () => {
  test("adding a bookmark writes the bookmarks file", async () => {
    const files = new MemoryFiles();
    const svc = new ProfileService(files);
    const res = await svc.addBookmark("Work", "Tracker", "https://tracker.test");
    expect(res.added).toBe(true);
    expect(files.files.get("bookmarks.txt")).toBe("Work|Tracker|https://tracker.test\n");

    const dup = await svc.addBookmark("Work", "Tracker", "https://tracker.test");
    expect(dup.added).toBe(false);
    expect(dup.folders).toEqual([
      { name: "Work", bookmarks: [{ title: "Tracker", url: "https://tracker.test" }] }
    ]);
  });

  test("removing the last bookmark leaves an empty file", async () => {
    const files = new MemoryFiles();
    files.files.set("bookmarks.txt", "Work|Tracker|https://tracker.test\n");
    const svc = new ProfileService(files);
    const res = await svc.removeBookmark("Work", "https://tracker.test");
    expect(res).toEqual({ removed: true, folders: [] });
    expect(files.files.get("bookmarks.txt")).toBe("");
  });

  test("history round trip and clear", async () => {
    const files = new MemoryFiles();
    const svc = new ProfileService(files);
    expect(await svc.getHistory()).toEqual([]);
    expect(await svc.saveHistory(["https://a.test", "https://b.test"])).toBe(2);
    expect(await svc.getHistory()).toEqual(["https://a.test", "https://b.test"]);
    await svc.clearHistory();
    expect(await svc.getHistory()).toEqual([]);
  });

  test("preferences fall back to defaults and merge updates", async () => {
    const files = new MemoryFiles();
    files.files.set("prefs.json", "{not json");
    const svc = new ProfileService(files);
    expect(await svc.getPrefs()).toEqual({
      theme: "system",
      homeUrl: DEFAULT_HOME_URL,
      searchEngine: "duckduckgo"
    });
    const next = await svc.updatePrefs({ theme: "dark" });
    expect(next.theme).toBe("dark");
    expect(JSON.parse(files.files.get("prefs.json") ?? "")).toEqual({
      theme: "dark",
      homeUrl: DEFAULT_HOME_URL,
      searchEngine: "duckduckgo"
    });
  });

  test("handle wraps results and errors", async () => {
    const svc = new ProfileService(new MemoryFiles());
    expect(await svc.handle("1", "history.get", {})).toEqual({
      id: "1",
      ok: true,
      result: { urls: [] }
    });
    expect(await svc.handle("2", "tabs.list", {})).toEqual({
      id: "2",
      ok: false,
      error: { code: "unknown_method", message: "unknown method: tabs.list", details: { method: "tabs.list" } }
    });
    const bad = await svc.handle("3", "bookmarks.add", { folder: "Work" });
    expect(bad.ok).toBe(false);
    if (!bad.ok) expect(bad.error.code).toBe("invalid_params");
  });
});
