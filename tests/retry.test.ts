import { describe, expect, it, vi } from "vitest";
import { RetryExhaustedError, describeError } from "../src/errors.js";
import { runWithRetry } from "../src/utils/retry.js";

describe("runWithRetry", () => {
  it("returns the first successful result without sleeping", async () => {
    const sleep = vi.fn(async () => {});
    const operation = vi.fn(async () => "ok");

    await expect(runWithRetry(operation, { label: "Download", sleep })).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("backs off exponentially between attempts", async () => {
    const delays: number[] = [];
    const sleep = async (ms: number) => {
      delays.push(ms);
    };
    let calls = 0;
    const operation = async (attempt: number) => {
      calls++;
      if (attempt < 3) throw new Error(`boom ${attempt}`);
      return attempt;
    };

    await expect(runWithRetry(operation, { label: "Transcription", baseDelayMs: 100, sleep })).resolves.toBe(3);
    expect(calls).toBe(3);
    expect(delays).toEqual([100, 200]);
  });

  it("throws RetryExhaustedError carrying the last failure", async () => {
    const delays: number[] = [];
    const warn = vi.fn();
    const last = new Error("still down");
    let attempt = 0;

    const promise = runWithRetry(
      async () => {
        attempt++;
        throw attempt === 4 ? last : new Error("down");
      },
      {
        label: "Formatting",
        maxAttempts: 4,
        baseDelayMs: 1000,
        sleep: async (ms) => {
          delays.push(ms);
        },
        logger: { warn },
      }
    );

    const error = await promise.catch((err: unknown) => err);
    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (!(error instanceof RetryExhaustedError)) return;
    expect(error.cause).toBe(last);
    expect(error.attempts).toBe(4);
    expect(error.message).toBe("Formatting failed after 4 attempts: still down");
    expect(describeError(error)).toBe("still down (after 4 attempts)");
    expect(delays).toEqual([1000, 2000, 4000]);
    expect(warn).toHaveBeenCalledTimes(3);
    expect(warn.mock.calls[0]?.[0]).toEqual({ attempt: 1, maxAttempts: 4, delayMs: 1000 });
  });

  it("makes at least one attempt", async () => {
    const operation = vi.fn(async () => {
      throw new Error("nope");
    });
    await expect(
      runWithRetry(operation, { label: "Download", maxAttempts: 0, sleep: async () => {} })
    ).rejects.toBeInstanceOf(RetryExhaustedError);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
