import { StoreRequestSchema, type StoreResponse } from "@skiff/schema";
import { errorMessage, type ProfileService } from "@skiff/core";
import type { Logger } from "./logger";

function badRequest(id: string, message: string, details?: Record<string, unknown>): StoreResponse {
  return {
    id,
    ok: false,
    error: details ? { code: "bad_request", message, details } : { code: "bad_request", message }
  };
}

function readId(raw: unknown): string {
  if (typeof raw === "object" && raw !== null && "id" in raw && typeof raw.id === "string") {
    return raw.id;
  }
  return "";
}

/**
 * Answers one JSON request line with one JSON response line. Requests are
 * applied strictly in arrival order, since every method rewrites whole files.
 */
export function createLineHandler(service: ProfileService, log: Logger) {
  let queue: Promise<unknown> = Promise.resolve();

  async function answer(line: string): Promise<StoreResponse> {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (e: unknown) {
      log.warn("unparseable request line", { error: errorMessage(e) });
      return badRequest("", "request is not valid JSON");
    }
    const parsed = StoreRequestSchema.safeParse(raw);
    if (!parsed.success) {
      return badRequest(readId(raw), "request does not match { id, method, params }", {
        issues: parsed.error.issues
      });
    }
    const { id, method, params } = parsed.data;
    const started = Date.now();
    const res = await service.handle(id, method, params ?? {});
    if (res.ok) {
      log.debug("request served", { id, method, ms: Date.now() - started });
    } else {
      log.warn("request failed", { id, method, code: res.error.code, message: res.error.message });
    }
    return res;
  }

  return (line: string): Promise<string> => {
    const next = queue.then(() => answer(line));
    queue = next.catch(() => undefined);
    return next.then((res) => JSON.stringify(res));
  };
}
