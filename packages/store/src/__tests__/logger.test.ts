import { describe, expect, test } from "vitest";
import { createLogger } from "../logger";

describe("logger", () => {
  test("drops lines below the level and formats fields", () => {
    const lines: string[] = [];
    const log = createLogger("info", (line) => lines.push(line));
    log.debug("hidden");
    log.info("profile ready", { dataDir: "/tmp/p" });
    log.error("boom");
    expect(lines).toEqual([
      '[skiff-store] info: profile ready {"dataDir":"/tmp/p"}',
      "[skiff-store] error: boom"
    ]);
  });

  test("silent drops everything", () => {
    const lines: string[] = [];
    const log = createLogger("silent", (line) => lines.push(line));
    log.error("nope");
    expect(lines).toEqual([]);
  });
});
