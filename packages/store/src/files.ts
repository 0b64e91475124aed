import fs from "node:fs/promises";
import path from "node:path";
import { StoreError, errorMessage, type TextFilePort } from "@skiff/core";

function isMissing(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}

/** Profile files kept side by side in one directory, created on first use. */
export class DirectoryTextFiles implements TextFilePort {
  private ready: Promise<void> | null = null;

  constructor(readonly dir: string) {}

  ensureDir(): Promise<void> {
    if (!this.ready) {
      this.ready = fs.mkdir(this.dir, { recursive: true }).then(() => undefined);
    }
    return this.ready;
  }

  private resolve(name: string): string {
    const base = path.basename(name);
    if (base !== name || name.startsWith(".")) {
      throw new StoreError("bad_request", `invalid profile file name: ${name}`);
    }
    return path.join(this.dir, name);
  }

  async read(name: string): Promise<string | null> {
    const file = this.resolve(name);
    try {
      return await fs.readFile(file, "utf8");
    } catch (e: unknown) {
      if (isMissing(e)) return null;
      throw new StoreError("io_error", errorMessage(e), { file });
    }
  }

  async write(name: string, text: string): Promise<void> {
    const file = this.resolve(name);
    try {
      await this.ensureDir();
      // Written beside the target, then renamed over it.
      const tmp = `${file}.tmp`;
      await fs.writeFile(tmp, text, "utf8");
      await fs.rename(tmp, file);
    } catch (e: unknown) {
      this.ready = null;
      throw new StoreError("io_error", errorMessage(e), { file });
    }
  }
}
