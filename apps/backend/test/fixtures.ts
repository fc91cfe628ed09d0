import { vi } from "vitest";
import type { StoredArticle } from "@readright/shared";
import type { Services } from "../src/services.js";

export const testEnv = {
  APPWRITE_ENDPOINT: "https://appwrite.test/v1",
  APPWRITE_FUNCTION_PROJECT_ID: "project-1",
  APPWRITE_API_KEY: "test-appwrite-key",
  APPWRITE_BUCKET_ID: "bucket-1",
  APPWRITE_DATABASE_ID: "db-1",
  APPWRITE_TABLE_ID: "articles",
  GEMINI_API_KEY: "test-gemini-key",
  DIFFBOT_TOKEN: "test-diffbot-token",
  TTS_API_KEY: "test-tts-key",
  PROVIDER: "mock"
};

export const AUDIO_URL = "https://appwrite.test/v1/storage/buckets/bucket-1/files/file-1/view?project=project-1";

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" }
  });
}

export function fakeServices() {
  return {
    extractor: {
      extract: vi.fn(async (url: string) => ({ text: "Lorem ipsum...", title: "Lorem", url }))
    },
    provider: {
      name: "mock" as const,
      rewrite: vi.fn(async (_text: string) => "Simplified lorem ipsum."),
      summarize: vi.fn(async (_text: string) => "- Point one\n- Point two"),
      title: vi.fn(async (_text: string) => "Generated title")
    },
    synthesizer: {
      synthesize: vi.fn(async (_text: string) => ({
        bytes: new Uint8Array([73, 68, 51]),
        mimeType: "audio/mpeg" as const
      }))
    },
    store: {
      persist: vi.fn(async () => ({
        storageFileId: "file-1",
        databaseRecordId: "row-1",
        audioUrl: AUDIO_URL
      })),
      find: vi.fn(async (_id: string): Promise<StoredArticle | null> => null)
    }
  } satisfies Services;
}
