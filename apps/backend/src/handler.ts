import type { ErrorResponse, ProcessArticleResponse } from "@readright/shared";
import { loadConfig } from "./config.js";
import { toErrorResponse } from "./errors.js";
import { processArticle } from "./pipeline/processArticle.js";
import { resolveInput } from "./pipeline/resolveInput.js";
import { createServices, type ServicesFactory } from "./services.js";

export type InvocationResult =
  | { ok: true; status: 200; body: ProcessArticleResponse }
  | { ok: false; status: number; body: ErrorResponse };

/**
 * Function entry point for hosts that hand over the parsed JSON body and the
 * environment on each invocation. Configuration is read before anything else,
 * so a misconfigured deployment never reaches an external service.
 */
export async function handleInvocation(
  payload: unknown,
  env: NodeJS.ProcessEnv = process.env,
  buildServices: ServicesFactory = createServices
): Promise<InvocationResult> {
  try {
    const services = buildServices(loadConfig(env));
    const source = resolveInput(payload);
    const body = await processArticle(source, services);
    return { ok: true, status: 200, body };
  } catch (error) {
    console.error("[handler] invocation failed:", error);
    return { ok: false, ...toErrorResponse(error) };
  }
}
