/** LLM request types */
export type LLMRequestType = "tag_normalization";

/** Base LLM request */
export interface LLMRequest {
  type: LLMRequestType;
  context: unknown;
  /** Standing instructions; sent as the system message where supported */
  system?: string;
  prompt: string;
}

/** Base LLM response. `data` is the parsed JSON body, unvalidated. */
export interface LLMResponse {
  success: boolean;
  data: unknown;
  reasoning: string;
}
