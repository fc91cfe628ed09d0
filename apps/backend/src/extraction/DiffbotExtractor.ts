import { ExtractionError, describeError } from "../errors.js";
import type { ArticleExtractor, ExtractedArticle } from "./ArticleExtractor.js";

const DIFFBOT_ARTICLE_URL = "https://api.diffbot.com/v3/article";
const EXTRACTION_TIMEOUT_MS = 25_000;

interface DiffbotArticleResponse {
  objects?: Array<{
    text?: string;
    title?: string;
    pageUrl?: string;
    author?: string;
    date?: string;
    siteName?: string;
  }>;
  error?: string;
  errorCode?: number;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

export class DiffbotExtractor implements ArticleExtractor {
  constructor(
    private readonly token: string,
    private readonly timeoutMs = EXTRACTION_TIMEOUT_MS
  ) {}

  async extract(url: string): Promise<ExtractedArticle> {
    const query = new URLSearchParams({ token: this.token, url });
    let response: Response;
    try {
      response = await fetch(`${DIFFBOT_ARTICLE_URL}?${query.toString()}`, {
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      if (isTimeout(error)) {
        throw new ExtractionError(`Extraction timed out after ${this.timeoutMs} ms`, { cause: error });
      }
      throw new ExtractionError(`Extraction request failed: ${describeError(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new ExtractionError(`Extraction failed with status ${response.status}`);
    }

    const payload = (await response.json().catch(() => ({}))) as DiffbotArticleResponse;
    if (payload.error || payload.errorCode) {
      throw new ExtractionError(`Extraction failed: ${payload.error ?? `error code ${payload.errorCode}`}`);
    }

    const article = payload.objects?.[0];
    const text = article?.text?.trim() ?? "";
    if (!article || !text) {
      throw new ExtractionError(`No article text found at ${url}`);
    }

    return {
      text,
      title: article.title?.trim() || "Untitled",
      url: article.pageUrl,
      author: article.author,
      date: article.date,
      siteName: article.siteName
    };
  }
}
