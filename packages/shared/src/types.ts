export type ErrorKind =
  | "ValidationError"
  | "ConfigurationError"
  | "ExtractionError"
  | "GenerationError"
  | "SynthesisError"
  | "PersistenceError"
  | "NotFoundError"
  | "PayloadTooLargeError"
  | "RateLimitError"
  | "InternalError";

/** Exactly one source: raw article text or the address of the article. */
export type ProcessArticleRequest = { text: string; url?: undefined } | { url: string; text?: undefined };

export interface ProcessArticleResponse {
  id: string;
  title: string;
  simplifiedText: string;
  summary: string[];
  audioId: string;
  audioUrl: string;
}

export interface StoredArticle extends ProcessArticleResponse {
  createdAt: string;
}

export interface ErrorResponse {
  error: {
    kind: ErrorKind;
    message: string;
  };
  requestId?: string;
}

export interface HealthResponse {
  ok: true;
  provider: "mock" | "gemini";
}
