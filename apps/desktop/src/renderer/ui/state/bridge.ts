import { ProfileService, type TextFilePort } from "@skiff/core";

type Parser<T> = { parse: (input: unknown) => T };

export type StoreBridge = {
  request: (method: string, params?: Record<string, unknown>) => Promise<unknown>;
};

const LOCAL_PREFIX = "skiff:";

/** Profile files kept in `localStorage`, one key per file. */
export class LocalStorageTextFiles implements TextFilePort {
  constructor(private readonly storage: Storage) {}

  async read(name: string): Promise<string | null> {
    return this.storage.getItem(LOCAL_PREFIX + name);
  }

  async write(name: string, text: string): Promise<void> {
    this.storage.setItem(LOCAL_PREFIX + name, text);
  }
}

let nextLocalId = 1;

export function createLocalBridge(storage: Storage): StoreBridge {
  const service = new ProfileService(new LocalStorageTextFiles(storage));
  return {
    async request(method, params) {
      const res = await service.handle(`local-${nextLocalId++}`, method, params ?? {});
      if (!res.ok) throw new Error(res.error.message);
      return res.result;
    }
  };
}

let fallback: StoreBridge | null = null;

export function getBridge(): StoreBridge {
  if (window.skiff) return window.skiff;
  if (!fallback) fallback = createLocalBridge(window.localStorage);
  return fallback;
}

export function resetBridgeForTests() {
  fallback = null;
}

export async function requestParsed<T>(
  method: string,
  params: Record<string, unknown> | undefined,
  schema: Parser<T>
): Promise<T> {
  const res = await getBridge().request(method, params || {});
  return schema.parse(res);
}
