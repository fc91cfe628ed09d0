import type { Server } from "node:http";
import { describe, it, expect, afterEach } from "vitest";
import { createApp } from "../src/app.js";
import { loadConfig } from "../src/config.js";
import { ExtractionError } from "../src/errors.js";
import { AUDIO_URL, fakeServices, testEnv } from "./fixtures.js";

let server: Server | undefined;

async function start(services: ReturnType<typeof fakeServices>): Promise<string> {
  const app = createApp(loadConfig(testEnv), services);
  const listening = await new Promise<Server>((resolve) => {
    const instance = app.listen(0, "127.0.0.1", () => resolve(instance));
  });
  server = listening;
  const address = listening.address();
  if (address === null || typeof address === "string") {
    throw new Error("server is not listening on a tcp port");
  }
  return `http://127.0.0.1:${address.port}`;
}

function postJson(url: string, body: string, headers: Record<string, string> = {}): Promise<Response> {
  return fetch(url, {
    method: "POST",
    headers: { "content-type": "application/json", ...headers },
    body
  });
}

afterEach(async () => {
  const current = server;
  server = undefined;
  if (!current) return;
  current.closeAllConnections();
  await new Promise<void>((resolve, reject) => current.close((err) => (err ? reject(err) : resolve())));
});

describe("article function http surface", () => {
  it("reports health with the provider name", async () => {
    const baseUrl = await start(fakeServices());

    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ ok: true, provider: "mock" });
  });

  it("processes an article url", async () => {
    const baseUrl = await start(fakeServices());

    const response = await postJson(`${baseUrl}/api/articles`, JSON.stringify({ url: "https://example.com/article" }));

    expect(response.status).toBe(200);
    expect(response.headers.get("x-request-id")).toBeTruthy();
    expect(await response.json()).toEqual({
      id: "row-1",
      title: "Lorem",
      simplifiedText: "Simplified lorem ipsum.",
      summary: ["Point one", "Point two"],
      audioId: "file-1",
      audioUrl: AUDIO_URL
    });
  });

  it("answers a bad request with the error kind and request id", async () => {
    const services = fakeServices();
    const baseUrl = await start(services);

    const response = await postJson(`${baseUrl}/api/articles`, "{}", { "x-request-id": "req-1" });

    expect(response.status).toBe(400);
    expect(response.headers.get("x-request-id")).toBe("req-1");
    expect(await response.json()).toEqual({
      error: { kind: "ValidationError", message: "Provide either text or url" },
      requestId: "req-1"
    });
    expect(services.extractor.extract).not.toHaveBeenCalled();
  });

  it("treats malformed json as a validation error", async () => {
    const baseUrl = await start(fakeServices());

    const response = await postJson(`${baseUrl}/api/articles`, "{");

    expect(response.status).toBe(400);
    const body = (await response.json()) as { error: { kind: string; message: string } };
    expect(body.error.kind).toBe("ValidationError");
    expect(body.error.message.startsWith("Invalid request body:")).toBe(true);
  });

  it("maps upstream failures to 502", async () => {
    const services = fakeServices();
    services.extractor.extract.mockRejectedValueOnce(
      new ExtractionError("No article text found at https://example.com/article")
    );
    const baseUrl = await start(services);

    const response = await postJson(`${baseUrl}/api/articles`, JSON.stringify({ url: "https://example.com/article" }), {
      "x-request-id": "req-2"
    });

    expect(response.status).toBe(502);
    expect(await response.json()).toEqual({
      error: { kind: "ExtractionError", message: "No article text found at https://example.com/article" },
      requestId: "req-2"
    });
  });

  it("reads a stored article", async () => {
    const services = fakeServices();
    const stored = {
      id: "row-1",
      title: "Lorem",
      simplifiedText: "Simplified lorem ipsum.",
      summary: ["Point one", "Point two"],
      audioId: "file-1",
      audioUrl: AUDIO_URL,
      createdAt: "2026-01-02T03:04:05.000+00:00"
    };
    services.store.find.mockResolvedValueOnce(stored);
    const baseUrl = await start(services);

    const response = await fetch(`${baseUrl}/api/articles/row-1`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual(stored);
    expect(services.store.find).toHaveBeenCalledWith("row-1");
  });

  it("returns 404 for an unknown article", async () => {
    const baseUrl = await start(fakeServices());

    const response = await fetch(`${baseUrl}/api/articles/row-9`, { headers: { "x-request-id": "req-3" } });

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      error: { kind: "NotFoundError", message: "Article row-9 not found" },
      requestId: "req-3"
    });
  });

  it("rejects an invalid article id", async () => {
    const services = fakeServices();
    const baseUrl = await start(services);

    const response = await fetch(`${baseUrl}/api/articles/bad%20id`);

    expect(response.status).toBe(400);
    expect(services.store.find).not.toHaveBeenCalled();
  });

  it("returns 404 for unknown routes", async () => {
    const baseUrl = await start(fakeServices());

    const response = await fetch(`${baseUrl}/api/unknown`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: { kind: "NotFoundError", message: "Not Found" } });
  });

  it("allows only configured origins", async () => {
    const baseUrl = await start(fakeServices());

    const allowed = await fetch(`${baseUrl}/health`, { headers: { origin: "http://localhost:8080" } });
    const refused = await fetch(`${baseUrl}/health`, { headers: { origin: "https://elsewhere.test" } });

    expect(allowed.headers.get("access-control-allow-origin")).toBe("http://localhost:8080");
    expect(refused.headers.get("access-control-allow-origin")).toBeNull();
  });
});

describe("request limits", () => {
  it("refuses the 31st request in a minute", async () => {
    const baseUrl = await start(fakeServices());

    for (let i = 0; i < 30; i += 1) {
      const response = await fetch(`${baseUrl}/health`);
      expect(response.status).toBe(200);
    }
    const limited = await fetch(`${baseUrl}/health`);

    expect(limited.status).toBe(429);
    expect(await limited.json()).toEqual({
      error: { kind: "RateLimitError", message: "Too many requests. Try again shortly." }
    });
  });

  it("refuses a body over 1 MB with 413", async () => {
    const services = fakeServices();
    const baseUrl = await start(services);

    const response = await postJson(`${baseUrl}/api/articles`, JSON.stringify({ text: "a".repeat(1_100_000) }), {
      "x-request-id": "req-4"
    });

    expect(response.status).toBe(413);
    expect(await response.json()).toEqual({
      error: { kind: "PayloadTooLargeError", message: "Request body too large: request entity too large" },
      requestId: "req-4"
    });
    expect(services.extractor.extract).not.toHaveBeenCalled();
    expect(services.provider.rewrite).not.toHaveBeenCalled();
  });

  it("accepts a body just under the limit", async () => {
    const services = fakeServices();
    const baseUrl = await start(services);

    const response = await postJson(`${baseUrl}/api/articles`, JSON.stringify({ text: "a".repeat(1_000_000) }));

    expect(response.status).toBe(200);
    expect(services.provider.rewrite).toHaveBeenCalledWith("a".repeat(1_000_000));
  });
});

describe("request ids", () => {
  it("replaces an id that does not look like one", async () => {
    const baseUrl = await start(fakeServices());

    const response = await fetch(`${baseUrl}/health`, { headers: { "x-request-id": "no spaces allowed" } });

    const id = response.headers.get("x-request-id");
    expect(id).not.toBe("no spaces allowed");
    expect(id).toMatch(/^[0-9a-f-]{36}$/);
  });
});
