import { processArticleRequestSchema } from "@readright/shared";
import { ValidationError } from "../errors.js";

export type ArticleSource = { kind: "text"; text: string } | { kind: "url"; url: string };

export function resolveInput(payload: unknown): ArticleSource {
  const result = processArticleRequestSchema.safeParse(payload ?? {});
  if (!result.success) {
    throw new ValidationError(result.error.issues.map((issue) => issue.message).join("; "), {
      cause: result.error
    });
  }

  const request = result.data;
  if (request.url !== undefined) {
    return { kind: "url", url: request.url.trim() };
  }
  return { kind: "text", text: request.text.trim() };
}
