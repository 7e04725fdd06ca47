/**
 * Clean LLM response to extract valid JSON.
 * Removes markdown code blocks, extra whitespace, and other common formatting issues.
 */
export function cleanJsonResponse(response: string): string {
  let cleaned = response.trim();

  // Remove markdown code blocks (```json ... ``` or ``` ... ```)
  cleaned = cleaned.replace(/^```(?:json)?\s*/i, "");
  cleaned = cleaned.replace(/\s*```\s*$/, "");

  // Keep from the first { to the last }
  const start = cleaned.indexOf("{");
  const end = cleaned.lastIndexOf("}");
  if (start >= 0 && end > start) {
    cleaned = cleaned.substring(start, end + 1);
  }

  return cleaned.trim();
}

/**
 * Parse a model reply as JSON, first as-is, then after cleaning.
 * Returns undefined when neither parses.
 */
export function parseJsonReply(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    try {
      return JSON.parse(cleanJsonResponse(text));
    } catch {
      return undefined;
    }
  }
}

export const JSON_RETRY_INSTRUCTION =
  "IMPORTANT: Your previous response was not valid JSON. Please respond with ONLY valid JSON, " +
  "no markdown formatting, no code blocks, no extra text. Start with { and end with }.";
