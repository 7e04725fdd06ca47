import { Ollama, type GenerateRequest } from "ollama";
import type { LLMProvider } from "../provider.js";
import type { LLMRequest, LLMResponse } from "../types.js";
import { JSON_RETRY_INSTRUCTION, parseJsonReply } from "../json.js";
import { errorMessage } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { fetchWithTimeout } from "../../utils/timeout.js";

export interface OllamaProviderConfig {
  model: string;
  apiEndpoint?: string; // Default: http://127.0.0.1:11434
  maxTokens?: number;
  temperature?: number;
  /** Abort each request after this long */
  timeoutMs?: number;
}

/** Subset of the Ollama client used here */
export interface OllamaClient {
  generate(request: GenerateRequest & { stream?: false }): Promise<{ response: string }>;
}

export class OllamaProvider implements LLMProvider {
  name = "ollama";
  private client: OllamaClient;
  private config: OllamaProviderConfig;

  constructor(config: OllamaProviderConfig, client?: OllamaClient) {
    this.config = config;
    this.client =
      client ??
      new Ollama({
        host: config.apiEndpoint || "http://127.0.0.1:11434",
        fetch: config.timeoutMs !== undefined ? fetchWithTimeout(config.timeoutMs) : undefined,
      });
  }

  async query(request: LLMRequest): Promise<LLMResponse> {
    return this.queryWithRetry(request, false);
  }

  private async queryWithRetry(request: LLMRequest, isRetry: boolean): Promise<LLMResponse> {
    try {
      // Add JSON instruction to prompt if this is a retry
      const prompt = isRetry ? `${request.prompt}\n\n${JSON_RETRY_INSTRUCTION}` : request.prompt;

      const response = await this.client.generate({
        model: this.config.model,
        system: request.system,
        prompt,
        format: "json", // Request JSON mode for structured outputs
        stream: false,
        options: {
          num_predict: this.config.maxTokens,
          temperature: this.config.temperature,
        },
      });

      const data = parseJsonReply(response.response);
      if (data === undefined) {
        if (isRetry) {
          logger.debug(`Raw response: ${response.response}`);
          return {
            success: false,
            data: undefined,
            reasoning: "Failed to parse JSON response after retry",
          };
        }
        logger.warn("JSON parse failed, retrying with explicit instruction...");
        return this.queryWithRetry(request, true);
      }

      return { success: true, data, reasoning: "ok" };
    } catch (error) {
      logger.error(`Ollama query failed: ${errorMessage(error)}`);
      return {
        success: false,
        data: undefined,
        reasoning: `Error: ${errorMessage(error)}`,
      };
    }
  }
}
