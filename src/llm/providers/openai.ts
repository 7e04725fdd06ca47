import OpenAI from "openai";
import type { LLMProvider } from "../provider.js";
import type { LLMRequest, LLMResponse } from "../types.js";
import { parseJsonReply } from "../json.js";
import { errorMessage } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export const OPENROUTER_URL = "https://openrouter.ai/api/v1";

export interface OpenAIProviderConfig {
  name: "openai" | "openrouter";
  model: string;
  apiKey: string;
  /** Base URL of an OpenAI-compatible endpoint */
  apiEndpoint?: string;
  maxTokens?: number;
  temperature?: number;
  /** Abort each request after this long */
  timeoutMs?: number;
}

/** Subset of the OpenAI client used here */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

/**
 * Chat-completions provider for OpenAI and OpenAI-compatible endpoints
 * such as OpenRouter.
 */
export class OpenAIProvider implements LLMProvider {
  readonly name: string;
  private client: ChatCompletionsClient;

  constructor(
    private readonly config: OpenAIProviderConfig,
    client?: ChatCompletionsClient
  ) {
    this.name = config.name;
    this.client =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.apiEndpoint ?? (config.name === "openrouter" ? OPENROUTER_URL : undefined),
        timeout: config.timeoutMs,
        maxRetries: 1,
      });
  }

  async query(request: LLMRequest): Promise<LLMResponse> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (request.system) messages.push({ role: "system", content: request.system });
    messages.push({ role: "user", content: request.prompt });

    try {
      const completion = await this.client.chat.completions.create({
        model: this.config.model,
        messages,
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
        response_format: { type: "json_object" },
      });

      const content = completion.choices[0]?.message.content;
      if (!content) {
        return { success: false, data: undefined, reasoning: "No content in completion" };
      }

      const data = parseJsonReply(content);
      if (data === undefined) {
        logger.debug(`Raw response: ${content}`);
        return { success: false, data: undefined, reasoning: "Completion was not valid JSON" };
      }
      return { success: true, data, reasoning: "ok" };
    } catch (error) {
      logger.error(`${this.name} query failed: ${errorMessage(error)}`);
      return { success: false, data: undefined, reasoning: `Error: ${errorMessage(error)}` };
    }
  }
}
