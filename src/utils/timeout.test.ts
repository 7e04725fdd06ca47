import { describe, it, expect, vi } from "vitest";
import { fetchWithTimeout, withTimeout } from "./timeout.js";
import { TimeoutError } from "./errors.js";

/** A fetch that never answers, recording the signal it was given */
function stalledFetch() {
  const signals: AbortSignal[] = [];
  const fetchFn: typeof fetch = (_input, init) => {
    const signal = init?.signal;
    return new Promise<Response>((_, reject) => {
      if (!signal) return;
      signals.push(signal);
      signal.addEventListener("abort", () => reject(signal.reason));
    });
  };
  return { fetchFn, signals };
}

describe("withTimeout", () => {
  it("rejects with TimeoutError at the deadline", async () => {
    await expect(withTimeout(new Promise(() => {}), 10, "slow call")).rejects.toThrow(TimeoutError);
  });

  it("passes through a result that arrives in time", async () => {
    await expect(withTimeout(Promise.resolve("done"), 1000, "fast call")).resolves.toBe("done");
  });
});

describe("fetchWithTimeout", () => {
  it("aborts a stalled request after the deadline", async () => {
    const { fetchFn, signals } = stalledFetch();

    await expect(fetchWithTimeout(20, fetchFn)("http://127.0.0.1:11434/api/generate")).rejects.toBeDefined();
    expect(signals).toHaveLength(1);
    expect(signals[0].aborted).toBe(true);
  });

  it("honours the caller's signal", async () => {
    const { fetchFn, signals } = stalledFetch();
    const caller = new AbortController();

    const pending = fetchWithTimeout(60_000, fetchFn)("http://127.0.0.1:11434/api/generate", {
      method: "POST",
      signal: caller.signal,
    });
    caller.abort(new Error("cancelled"));

    await expect(pending).rejects.toThrow("cancelled");
    expect(signals[0].aborted).toBe(true);
  });

  it("forwards method and body", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => new Response("{}"));

    await fetchWithTimeout(1000, fetchFn)("http://127.0.0.1:11434/api/generate", {
      method: "POST",
      body: "{}",
    });

    expect(fetchFn).toHaveBeenCalledWith(
      "http://127.0.0.1:11434/api/generate",
      expect.objectContaining({ method: "POST", body: "{}", signal: expect.any(AbortSignal) })
    );
  });
});
