import { describe, it, expect } from "vitest";
import { withTimeout } from "../../src/utils/timeout.js";
import { ReasoningTimeout } from "../../src/utils/errors.js";

describe("withTimeout", () => {
  it("returns the result when the call finishes in time", async () => {
    const value = await withTimeout(async () => "done", 100, () => new ReasoningTimeout(100));
    expect(value).toBe("done");
  });

  it("rejects with the timeout error and aborts the signal", async () => {
    let seen: AbortSignal | undefined;
    const pending = withTimeout(
      (signal) => {
        seen = signal;
        return new Promise<string>(() => {});
      },
      20,
      () => new ReasoningTimeout(20),
    );

    await expect(pending).rejects.toBeInstanceOf(ReasoningTimeout);
    expect(seen?.aborted).toBe(true);
    expect(seen?.reason).toBeInstanceOf(ReasoningTimeout);
  });

  it("passes through the call's own rejection", async () => {
    await expect(
      withTimeout(async () => Promise.reject(new Error("upstream")), 100, () => new ReasoningTimeout(100)),
    ).rejects.toThrow("upstream");
  });
});
