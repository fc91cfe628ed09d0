import { z } from "zod";
import type { ProcessArticleRequest } from "./types.js";

const optionalText = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().optional()
);

function isSingleSource(value: { text?: string; url?: string }): value is ProcessArticleRequest {
  return (value.text === undefined) !== (value.url === undefined);
}

function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === "http:" || parsed.protocol === "https:";
  } catch {
    return false;
  }
}

export const processArticleRequestSchema = z
  .object({
    text: optionalText,
    url: optionalText
  })
  .superRefine((value, ctx) => {
    if (value.text === undefined && value.url === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Provide either text or url", fatal: true });
      return;
    }
    if (value.text !== undefined && value.url !== undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Provide only one of text or url", fatal: true });
      return;
    }
    if (value.url !== undefined && !isHttpUrl(value.url.trim())) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["url"],
        message: "url must be an absolute http(s) URL"
      });
    }
  })
  // Never fails after the checks above; narrows the output to one source.
  .refine(isSingleSource, "Provide exactly one of text or url");

export const articleIdSchema = z
  .string()
  .regex(/^[a-zA-Z0-9][a-zA-Z0-9._-]{0,35}$/, "Invalid article id");
