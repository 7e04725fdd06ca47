import type { LLMRequest, LLMResponse } from "./types.js";

/** LLM provider interface */
export interface LLMProvider {
  /** Provider name (e.g., "ollama", "openai", "openrouter") */
  name: string;

  /**
   * Send a query to the LLM provider
   * @returns The parsed JSON reply, or success=false with the reason
   */
  query(request: LLMRequest): Promise<LLMResponse>;
}
