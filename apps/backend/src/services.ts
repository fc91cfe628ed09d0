import type { AppConfig } from "./config.js";
import type { ArticleExtractor } from "./extraction/ArticleExtractor.js";
import { DiffbotExtractor } from "./extraction/DiffbotExtractor.js";
import type { ArticleStore } from "./persistence/ArticleStore.js";
import { AppwriteStore } from "./persistence/AppwriteStore.js";
import { createProvider } from "./providers/index.js";
import type { LLMProvider } from "./providers/LLMProvider.js";
import { GoogleSpeechSynthesizer } from "./speech/GoogleSpeechSynthesizer.js";
import type { SpeechSynthesizer } from "./speech/SpeechSynthesizer.js";

export interface Services {
  extractor: ArticleExtractor;
  provider: LLMProvider;
  synthesizer: SpeechSynthesizer;
  store: ArticleStore;
}

export type ServicesFactory = (config: AppConfig) => Services;

export const createServices: ServicesFactory = (config) => ({
  extractor: new DiffbotExtractor(config.diffbot.token),
  provider: createProvider(config.llm),
  synthesizer: new GoogleSpeechSynthesizer(config.tts.apiKey, config.tts.voice),
  store: new AppwriteStore(config.appwrite)
});
