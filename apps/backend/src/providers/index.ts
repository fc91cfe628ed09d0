import type { AppConfig } from "../config.js";
import { GeminiProvider } from "./GeminiProvider.js";
import type { LLMProvider } from "./LLMProvider.js";
import { MockProvider } from "./MockProvider.js";

export function createProvider(config: AppConfig["llm"]): LLMProvider {
  if (config.provider === "mock") {
    return new MockProvider();
  }
  return new GeminiProvider(config.apiKey, config.model);
}
