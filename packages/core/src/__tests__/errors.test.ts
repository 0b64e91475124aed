import { describe, expect, test } from "vitest";
import { StoreError, errorMessage, toStoreError } from "../errors";

describe("store errors", () => {
  test("keeps the details it was given", () => {
    const err = new StoreError("invalid_params", "invalid params", { field: "url" });
    expect(err.code).toBe("invalid_params");
    expect(err.details).toEqual({ field: "url" });
    expect(new StoreError("io_error", "disk full").details).toBeUndefined();
  });

  test("anything else becomes an internal error", () => {
    const own = new StoreError("bad_request", "nope");
    expect(toStoreError(own)).toBe(own);
    const wrapped = toStoreError(new Error("boom"));
    expect(wrapped.code).toBe("internal");
    expect(wrapped.message).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });
});
