import { describe, it } from "node:test";
import assert from "node:assert";
import { withTimeout } from "./timeout.ts";

describe("withTimeout", () => {
  it("should resolve with the value when it settles in time", async () => {
    const value = await withTimeout(Promise.resolve("ok"), 1000, () => new Error("late"));
    assert.strictEqual(value, "ok");
  });

  it("should pass through rejections", async () => {
    await assert.rejects(
      withTimeout(Promise.reject(new Error("inner")), 1000, () => new Error("late")),
      /inner/
    );
  });

  it("should reject with the timeout error when the promise hangs", async () => {
    const never = new Promise<string>(() => {});
    await assert.rejects(
      withTimeout(never, 10, () => new Error("timed out")),
      /timed out/
    );
  });
});
