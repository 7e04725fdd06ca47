import type { LLMConfig } from "../config/types.js";
import type { LLMProvider } from "./provider.js";
import { OllamaProvider } from "./providers/ollama.js";
import { OpenAIProvider } from "./providers/openai.js";
import { ConfigError } from "../utils/errors.js";

export type { LLMProvider } from "./provider.js";
export type { LLMRequest, LLMResponse, LLMRequestType } from "./types.js";
export { OllamaProvider } from "./providers/ollama.js";
export { OpenAIProvider } from "./providers/openai.js";

/**
 * Create an LLM provider from config.
 * Returns null if LLM is not enabled.
 */
export function createLLMProvider(config: Readonly<LLMConfig>): LLMProvider | null {
  if (!config.enabled) {
    return null;
  }

  switch (config.provider) {
    case "ollama":
      return new OllamaProvider({
        model: config.model,
        apiEndpoint: config.apiEndpoint,
        maxTokens: config.maxTokens,
        temperature: config.temperature,
        timeoutMs: config.timeoutMs,
      });

    case "openai":
    case "openrouter":
      if (!config.apiKey) {
        throw new ConfigError(`llm.apiKey is required for provider "${config.provider}"`);
      }
      return new OpenAIProvider({
        name: config.provider,
        model: config.model,
        apiKey: config.apiKey,
        apiEndpoint: config.apiEndpoint,
        maxTokens: config.maxTokens,
        temperature: config.temperature,
        timeoutMs: config.timeoutMs,
      });
  }
}
