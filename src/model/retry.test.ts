// pattern: Imperative Shell

import { describe, it, expect, vi, afterEach } from "vitest";
import { callWithRetry } from "./retry.js";

describe("callWithRetry", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe("success path", () => {
    it("should call function once if successful on first attempt", async () => {
      const fn = vi.fn(async () => "success");

      const result = await callWithRetry(fn, () => false);

      expect(result).toBe("success");
      expect(fn).toHaveBeenCalledTimes(1);
    });
  });

  describe("retryable errors", () => {
    it("should stop after maxAttempts and rethrow the last error", async () => {
      let callCount = 0;

      await expect(
        callWithRetry(
          async () => {
            callCount++;
            throw new Error(`retryable error ${callCount}`);
          },
          () => true,
          { maxAttempts: 3, initialBackoffMs: 0 }
        )
      ).rejects.toThrow("retryable error 3");

      expect(callCount).toBe(3);
    });

    it("should succeed after retrying", async () => {
      let callCount = 0;

      const result = await callWithRetry(
        async () => {
          callCount++;
          if (callCount < 2) {
            throw new Error("retry me");
          }
          return "success after retry";
        },
        (error) => error instanceof Error && error.message === "retry me",
        { initialBackoffMs: 0 }
      );

      expect(result).toBe("success after retry");
      expect(callCount).toBe(2);
    });

    it("should call onError on each failed attempt", async () => {
      const attempts: Array<number> = [];

      await expect(
        callWithRetry(
          async () => {
            throw new Error("always fail");
          },
          () => true,
          {
            initialBackoffMs: 0,
            onError: (_error, attempt) => {
              attempts.push(attempt);
            },
          }
        )
      ).rejects.toThrow("always fail");

      expect(attempts).toEqual([0, 1, 2]);
    });
  });

  describe("non-retryable errors", () => {
    it("should throw immediately for non-retryable errors", async () => {
      let callCount = 0;

      await expect(
        callWithRetry(
          async () => {
            callCount++;
            throw new Error("non-retryable");
          },
          () => false
        )
      ).rejects.toThrow("non-retryable");

      expect(callCount).toBe(1);
    });
  });

  describe("backoff timing", () => {
    it("should double the backoff between attempts", async () => {
      vi.useFakeTimers();
      const timestamps: Array<number> = [];

      const pending = callWithRetry(
        async () => {
          timestamps.push(Date.now());
          throw new Error("retry");
        },
        () => true,
        { maxAttempts: 3, initialBackoffMs: 1000 }
      );
      const settled = pending.catch((error: unknown) => error);

      await vi.runAllTimersAsync();
      const error = await settled;

      expect(error).toBeInstanceOf(Error);
      expect(timestamps).toHaveLength(3);
      const [first, second, third] = timestamps;
      expect((second ?? 0) - (first ?? 0)).toBe(1000);
      expect((third ?? 0) - (second ?? 0)).toBe(2000);
    });
  });
});
