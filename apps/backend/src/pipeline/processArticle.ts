import type { ProcessArticleResponse } from "@readright/shared";
import { GenerationError } from "../errors.js";
import type { Services } from "../services.js";
import { buildResponse } from "./buildResponse.js";
import type { ArticleSource } from "./resolveInput.js";
import { parseBullets } from "./summary.js";

async function loadArticle(source: ArticleSource, services: Services): Promise<{ text: string; title: string }> {
  if (source.kind === "url") {
    const article = await services.extractor.extract(source.url);
    console.log("[pipeline] extracted article", { url: source.url, characters: article.text.length });
    return { text: article.text, title: article.title };
  }
  const title = (await services.provider.title(source.text)).trim();
  return { text: source.text, title: title || "Untitled" };
}

/**
 * Runs one article through extraction, rewriting, summarizing, narration and
 * persistence, in that order. The first failure stops the run.
 */
export async function processArticle(source: ArticleSource, services: Services): Promise<ProcessArticleResponse> {
  const { text, title } = await loadArticle(source, services);

  const simplifiedText = (await services.provider.rewrite(text)).trim();
  if (!simplifiedText) {
    throw new GenerationError("The model returned an empty rewrite");
  }

  const summary = parseBullets(await services.provider.summarize(text));
  if (summary.length === 0) {
    throw new GenerationError("The model returned an empty summary");
  }
  console.log("[pipeline] generated text", { provider: services.provider.name, bullets: summary.length });

  const audio = await services.synthesizer.synthesize(simplifiedText);
  console.log("[pipeline] synthesized narration", { bytes: audio.bytes.length });

  const stored = await services.store.persist({ audio, title, simplifiedText, summary });
  console.log("[pipeline] stored article", { fileId: stored.storageFileId, rowId: stored.databaseRecordId });

  return buildResponse({ title, simplifiedText, summary }, stored);
}
