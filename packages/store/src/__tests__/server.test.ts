import { describe, expect, test } from "vitest";
import { ProfileService, type TextFilePort } from "@skiff/core";
import { createLogger } from "../logger";
import { createLineHandler } from "../server";

class MemoryFiles implements TextFilePort {
  readonly files = new Map<string, string>();

  async read(name: string): Promise<string | null> {
    return this.files.get(name) ?? null;
  }

  async write(name: string, text: string): Promise<void> {
    this.files.set(name, text);
  }
}

function setup() {
  const lines: string[] = [];
  const handle = createLineHandler(
    new ProfileService(new MemoryFiles()),
    createLogger("warn", (line) => lines.push(line))
  );
  return { handle, lines };
}

describe("store line protocol", () => {
  test("answers requests in order", async () => {
    const { handle } = setup();
    const a = handle(
      JSON.stringify({
        id: "1",
        method: "bookmarks.add",
        params: { folder: "Work", title: "Tracker", url: "https://tracker.test" }
      })
    );
    const b = handle(JSON.stringify({ id: "2", method: "bookmarks.list" }));
    expect(JSON.parse(await a)).toEqual({
      id: "1",
      ok: true,
      result: {
        added: true,
        folders: [{ name: "Work", bookmarks: [{ title: "Tracker", url: "https://tracker.test" }] }]
      }
    });
    expect(JSON.parse(await b)).toEqual({
      id: "2",
      ok: true,
      result: {
        folders: [{ name: "Work", bookmarks: [{ title: "Tracker", url: "https://tracker.test" }] }]
      }
    });
  });

  test("invalid json is a bad request with an empty id", async () => {
    const { handle, lines } = setup();
    expect(JSON.parse(await handle("{oops"))).toEqual({
      id: "",
      ok: false,
      error: { code: "bad_request", message: "request is not valid JSON" }
    });
    expect(lines).toHaveLength(1);
  });

  test("a request without a method keeps its id", async () => {
    const { handle } = setup();
    const res = JSON.parse(await handle(JSON.stringify({ id: "7" })));
    expect(res.id).toBe("7");
    expect(res.error.code).toBe("bad_request");
  });

  test("service errors are logged and returned", async () => {
    const { handle, lines } = setup();
    const res = JSON.parse(await handle(JSON.stringify({ id: "9", method: "nope" })));
    expect(res.error).toEqual({
      code: "unknown_method",
      message: "unknown method: nope",
      details: { method: "nope" }
    });
    expect(lines).toEqual([
      '[skiff-store] warn: request failed {"id":"9","method":"nope","code":"unknown_method","message":"unknown method: nope"}'
    ]);
  });
});
