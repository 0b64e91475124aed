import readline from "node:readline";
import { ProfileService } from "@skiff/core";
import { loadConfig } from "./config";
import { DirectoryTextFiles } from "./files";
import { createLogger } from "./logger";
import { createLineHandler } from "./server";

async function main() {
  const config = loadConfig();
  const log = createLogger(config.logLevel);
  const files = new DirectoryTextFiles(config.dataDir);
  await files.ensureDir();
  log.info("profile ready", { dataDir: config.dataDir });

  const handle = createLineHandler(new ProfileService(files), log);
  const rl = readline.createInterface({ input: process.stdin, terminal: false });
  const pending = new Set<Promise<void>>();

  rl.on("line", (line) => {
    if (!line.trim()) return;
    const p = handle(line)
      .then((out) => {
        process.stdout.write(`${out}\n`);
      })
      .catch((e: unknown) => {
        log.error("failed to answer request", { error: String(e) });
      })
      .finally(() => {
        pending.delete(p);
      });
    pending.add(p);
  });

  rl.on("close", () => {
    void Promise.all(pending).then(() => {
      log.info("stdin closed, exiting");
    });
  });
}

main().catch((e: unknown) => {
  process.stderr.write(`[skiff-store] fatal: ${e instanceof Error ? e.stack ?? e.message : String(e)}\n`);
  process.exitCode = 1;
});
