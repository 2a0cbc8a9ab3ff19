import { describe, it, expect } from "vitest";
import { sleep, withAbortTimeout } from "../async.js";

describe("sleep", () => {
  it("resolves immediately for a zero delay", async () => {
    await expect(sleep(0)).resolves.toBeUndefined();
  });
});

describe("withAbortTimeout", () => {
  it("returns the result when the work finishes in time", async () => {
    await expect(withAbortTimeout(1000, async () => "done")).resolves.toBe("done");
  });

  it("aborts the signal once the timeout passes", async () => {
    const aborted = await withAbortTimeout(
      5,
      (signal) =>
        new Promise<boolean>((resolve) => {
          signal.addEventListener("abort", () => resolve(signal.aborted));
        })
    );

    expect(aborted).toBe(true);
  });
});
