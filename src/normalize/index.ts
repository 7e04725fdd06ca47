import type { Config } from "../config/types.js";
import { createLLMProvider } from "../llm/index.js";
import { LlmNormalizer } from "./llm.js";
import { MemoizingNormalizer } from "./memo.js";
import { RuleBasedNormalizer } from "./rule-based.js";
import type { Normalizer } from "./types.js";

export type { Normalizer, NormalizationInput, NormalizationCandidate } from "./types.js";
export { RuleBasedNormalizer, normalizeByRules } from "./rule-based.js";
export { LlmNormalizer } from "./llm.js";
export { MemoizingNormalizer } from "./memo.js";

/**
 * Pick the normalizer for this run: the LLM when enabled, otherwise the
 * rule-based one. Wrapped in a memo when behavior.memoizeNormalization is set.
 */
export function createNormalizer(config: Readonly<Config>): Normalizer {
  const provider = createLLMProvider(config.llm);
  const base: Normalizer = provider
    ? new LlmNormalizer(provider)
    : new RuleBasedNormalizer(config);
  return config.behavior.memoizeNormalization ? new MemoizingNormalizer(base) : base;
}
