import { describe, expect, test } from "vitest";
import { BookmarkBook, CREATE_FOLDER_CHOICE, folderChoices } from "../bookmarks";

describe("bookmark book", () => {
  test("files bookmarks by folder in insertion order", () => {
    const book = new BookmarkBook();
    expect(book.add("Work", "Tracker", "https://tracker.test")).toBe(true);
    expect(book.add("  News ", "Daily", "https://daily.test")).toBe(true);
    expect(book.add("Work", "Docs", "https://docs.test")).toBe(true);
    expect(book.folderNames()).toEqual(["Work", "News"]);
    expect(book.toFolders()).toEqual([
      {
        name: "Work",
        bookmarks: [
          { title: "Tracker", url: "https://tracker.test" },
          { title: "Docs", url: "https://docs.test" }
        ]
      },
      { name: "News", bookmarks: [{ title: "Daily", url: "https://daily.test" }] }
    ]);
  });

  test("a url is filed once per folder", () => {
    const book = new BookmarkBook();
    book.add("Work", "Tracker", "https://tracker.test");
    expect(book.add("Work", "Again", "https://tracker.test")).toBe(false);
    expect(book.add("Other", "Again", "https://tracker.test")).toBe(true);
    expect(book.toFolders().map((f) => f.name)).toEqual(["Work", "Other"]);
  });

  test("blank folder names are refused and blank titles fall back to the url", () => {
    const book = new BookmarkBook();
    expect(book.add("   ", "T", "https://a.test")).toBe(false);
    book.add("F", "", "https://a.test");
    expect(book.toFolders()[0].bookmarks[0]).toEqual({ title: "https://a.test", url: "https://a.test" });
  });

  test("removing the last bookmark drops the folder", () => {
    const book = new BookmarkBook();
    book.add("Work", "Tracker", "https://tracker.test");
    book.add("News", "Daily", "https://daily.test");
    expect(book.remove("Work", "https://nope.test")).toBe(false);
    expect(book.remove("Work", "https://tracker.test")).toBe(true);
    expect(book.folderNames()).toEqual(["News"]);
  });

  test("folder choices offer a new folder only once folders exist", () => {
    expect(folderChoices([])).toEqual([]);
    expect(folderChoices(["Work"])).toEqual(["Work", CREATE_FOLDER_CHOICE]);
  });
});
