import type { NormalizationInput, Normalizer } from "./types.js";

/**
 * Reuses normalizer output for byte-identical inputs within one run.
 * Failed calls are not cached.
 */
export class MemoizingNormalizer implements Normalizer {
  readonly kind: Normalizer["kind"];
  private cache = new Map<string, Promise<unknown>>();

  constructor(private inner: Normalizer) {
    this.kind = inner.kind;
  }

  normalize(input: NormalizationInput): Promise<unknown> {
    const key = JSON.stringify(input);
    const cached = this.cache.get(key);
    if (cached) return cached;

    const pending = this.inner.normalize(input).catch((e: unknown) => {
      this.cache.delete(key);
      throw e;
    });
    this.cache.set(key, pending);
    return pending;
  }

  get size(): number {
    return this.cache.size;
  }
}
