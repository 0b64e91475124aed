import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ProfileService } from "@skiff/core";
import { DirectoryTextFiles } from "../files";

let root = "";

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "skiff-files-"));
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe("directory text files", () => {
  test("missing files read as null", async () => {
    const files = new DirectoryTextFiles(path.join(root, "profile"));
    expect(await files.read("history.txt")).toBeNull();
  });

  test("writes create the directory", async () => {
    const dir = path.join(root, "nested", "profile");
    const files = new DirectoryTextFiles(dir);
    await files.write("history.txt", "https://a.test\n");
    expect(await fs.readFile(path.join(dir, "history.txt"), "utf8")).toBe("https://a.test\n");
    expect(await fs.readdir(dir)).toEqual(["history.txt"]);
  });

  test("names outside the profile directory are refused", async () => {
    const files = new DirectoryTextFiles(root);
    await expect(files.read("../secret.txt")).rejects.toMatchObject({ code: "bad_request" });
  });

  test("profile service persists bookmarks through the directory", async () => {
    const files = new DirectoryTextFiles(root);
    const svc = new ProfileService(files);
    await svc.addBookmark("Bookmarks", "Example", "https://example.test");
    expect(await fs.readFile(path.join(root, "bookmarks.txt"), "utf8")).toBe(
      "Bookmarks|Example|https://example.test\n"
    );
    const again = new ProfileService(new DirectoryTextFiles(root));
    expect(await again.listBookmarks()).toEqual([
      { name: "Bookmarks", bookmarks: [{ title: "Example", url: "https://example.test" }] }
    ]);
  });
});
