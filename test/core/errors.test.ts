import { describe, it, expect, vi } from "vitest";
import {
  ContentTooLargeError,
  LocalWriteError,
  NetworkError,
  SyncError,
  SyncPassError,
  isRetryable,
  withRetry,
  type RetryConfig,
} from "../../src/core/errors.js";

const fastRetry: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1,
  maxDelayMs: 5,
  backoffMultiplier: 2,
};

describe("errors", () => {
  it("should mark network errors retryable unless told otherwise", () => {
    expect(new NetworkError("boom").retryable).toBe(true);
    expect(new NetworkError("denied", undefined, false).retryable).toBe(false);
    expect(new NetworkError("boom")).toBeInstanceOf(SyncError);
  });

  it("should describe oversized objects", () => {
    const err = new ContentTooLargeError("json/a.json", 1024);
    expect(err.message).toBe("Object json/a.json exceeds 1024 bytes");
    expect(err.name).toBe("ContentTooLargeError");
  });

  it("should summarise failed resources in a pass error", () => {
    const err = new SyncPassError([new Error("x"), new Error("y")], {
      group: "fares",
      fetched: ["c.json"],
      reused: [],
      skipped: [],
      failed: ["a.json", "b.json"],
    });
    expect(err).toBeInstanceOf(AggregateError);
    expect(err.message).toBe("Failed to sync 2 resource(s) in fares: a.json, b.json");
    expect(err.errors).toHaveLength(2);
  });
});

const report = { group: "zones", fetched: [], reused: [], skipped: [], failed: ["a.json"] };

describe("isRetryable", () => {
  it("should follow the retryable flag of sync errors", () => {
    expect(isRetryable(new NetworkError("flaky"))).toBe(true);
    expect(isRetryable(new ContentTooLargeError("a.json", 1))).toBe(false);
    expect(isRetryable(new Error("bug"))).toBe(false);
  });

  it("should require every aggregated error to be retryable", () => {
    expect(isRetryable(new SyncPassError([new NetworkError("flaky")], report))).toBe(true);
    expect(
      isRetryable(
        new SyncPassError([new NetworkError("flaky"), new ContentTooLargeError("b.json", 1)], report),
      ),
    ).toBe(false);
    expect(isRetryable(new AggregateError([], "nothing"))).toBe(false);
  });
});

describe("withRetry", () => {
  it("should return the first successful result", async () => {
    const fn = vi.fn().mockResolvedValue("ok");
    expect(await withRetry(fn, fastRetry)).toBe("ok");
    expect(fn).toHaveBeenCalledOnce();
  });

  it("should retry retryable sync errors", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new NetworkError("flaky"))
      .mockRejectedValueOnce(new NetworkError("flaky"))
      .mockResolvedValue("ok");
    expect(await withRetry(fn, fastRetry)).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("should retry a pass whose downloads all failed transiently", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new SyncPassError([new NetworkError("reset")], report))
      .mockResolvedValue("ok");
    expect(await withRetry(fn, fastRetry)).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("should give up after the last attempt", async () => {
    const fn = vi.fn().mockRejectedValue(new NetworkError("down"));
    await expect(withRetry(fn, fastRetry)).rejects.toThrow("down");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("should not retry non-retryable errors", async () => {
    const fn = vi.fn().mockRejectedValue(new LocalWriteError("disk full", "/tmp/x"));
    await expect(withRetry(fn, fastRetry)).rejects.toBeInstanceOf(LocalWriteError);
    expect(fn).toHaveBeenCalledOnce();
  });

  it("should not retry plain errors", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("bug"));
    await expect(withRetry(fn, fastRetry)).rejects.toThrow("bug");
    expect(fn).toHaveBeenCalledOnce();
  });
});
