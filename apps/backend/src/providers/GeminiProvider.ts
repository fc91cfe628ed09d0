import { GenerationError, describeError } from "../errors.js";
import type { LLMProvider } from "./LLMProvider.js";
import { REWRITE_PROMPT, SUMMARY_PROMPT, TITLE_PROMPT, buildPrompt } from "./prompts.js";

const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/models";

interface GenerateContentResponse {
  candidates?: Array<{
    content?: { parts?: Array<{ text?: string }> };
    finishReason?: string;
  }>;
  promptFeedback?: { blockReason?: string };
}

export class GeminiProvider implements LLMProvider {
  readonly name = "gemini" as const;

  constructor(
    private readonly apiKey: string,
    private readonly model: string
  ) {}

  private async callGemini(prompt: string): Promise<string> {
    let response: Response;
    try {
      response = await fetch(`${GEMINI_BASE_URL}/${encodeURIComponent(this.model)}:generateContent`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "x-goog-api-key": this.apiKey
        },
        body: JSON.stringify({
          contents: [{ role: "user", parts: [{ text: prompt }] }]
        })
      });
    } catch (error) {
      throw new GenerationError(`Gemini request failed: ${describeError(error)}`, { cause: error });
    }

    if (response.status === 429) {
      throw new GenerationError("Gemini rate limit reached");
    }
    if (!response.ok) {
      throw new GenerationError(`Gemini request failed with status ${response.status}`);
    }

    // A body that is not JSON is treated as an empty reply.
    const payload = (await response.json().catch(() => ({}))) as GenerateContentResponse;
    const blockReason = payload.promptFeedback?.blockReason;
    if (blockReason) {
      throw new GenerationError(`Gemini blocked the prompt: ${blockReason}`);
    }

    const candidate = payload.candidates?.[0];
    if (candidate?.finishReason && candidate.finishReason !== "STOP") {
      throw new GenerationError(`Gemini stopped early: ${candidate.finishReason}`);
    }

    const text = (candidate?.content?.parts ?? [])
      .map((part) => part.text ?? "")
      .join("")
      .trim();
    if (!text) {
      throw new GenerationError("Gemini returned an empty response");
    }
    return text;
  }

  async rewrite(text: string): Promise<string> {
    return this.callGemini(buildPrompt(REWRITE_PROMPT, text));
  }

  async summarize(text: string): Promise<string> {
    return this.callGemini(buildPrompt(SUMMARY_PROMPT, text));
  }

  async title(text: string): Promise<string> {
    return this.callGemini(buildPrompt(TITLE_PROMPT, text));
  }
}
