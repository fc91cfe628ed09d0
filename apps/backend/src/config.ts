import { z } from "zod";
import { ConfigurationError } from "./errors.js";

const required = z.string().trim().min(1, "is required");

const envSchema = z.object({
  APPWRITE_FUNCTION_PROJECT_ID: required,
  APPWRITE_BUCKET_ID: required,
  APPWRITE_DATABASE_ID: required,
  APPWRITE_TABLE_ID: required,
  APPWRITE_API_KEY: required,
  GEMINI_API_KEY: required,
  DIFFBOT_TOKEN: required,
  APPWRITE_ENDPOINT: z.string().trim().url().default("https://fra.cloud.appwrite.io/v1"),
  GEMINI_MODEL: z.string().trim().min(1).default("gemini-2.5-flash"),
  PROVIDER: z.enum(["gemini", "mock"]).default("gemini"),
  TTS_API_KEY: z.string().trim().min(1).optional(),
  TTS_VOICE: z.string().trim().min(1).default("en-GB-Neural2-C"),
  ALLOWED_ORIGINS: z.string().default("http://localhost:8080"),
  BACKEND_PORT: z.coerce.number().int().min(0).max(65535).default(4000)
});

export interface AppConfig {
  readonly port: number;
  readonly allowedOrigins: readonly string[];
  readonly appwrite: {
    readonly endpoint: string;
    readonly projectId: string;
    readonly apiKey: string;
    readonly bucketId: string;
    readonly databaseId: string;
    readonly tableId: string;
  };
  readonly llm: {
    readonly provider: "gemini" | "mock";
    readonly apiKey: string;
    readonly model: string;
  };
  readonly diffbot: {
    readonly token: string;
  };
  readonly tts: {
    readonly apiKey: string;
    readonly voice: string;
  };
}

/**
 * Builds the configuration once from the environment. Empty strings count as
 * unset so that a blank line in a `.env` file does not mask a missing value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${problems.join("; ")}`);
  }

  const values = result.data;
  return Object.freeze({
    port: values.BACKEND_PORT,
    allowedOrigins: values.ALLOWED_ORIGINS.split(",")
      .map((origin) => origin.trim())
      .filter(Boolean),
    appwrite: {
      endpoint: values.APPWRITE_ENDPOINT.replace(/\/+$/, ""),
      projectId: values.APPWRITE_FUNCTION_PROJECT_ID,
      apiKey: values.APPWRITE_API_KEY,
      bucketId: values.APPWRITE_BUCKET_ID,
      databaseId: values.APPWRITE_DATABASE_ID,
      tableId: values.APPWRITE_TABLE_ID
    },
    llm: {
      provider: values.PROVIDER,
      apiKey: values.GEMINI_API_KEY,
      model: values.GEMINI_MODEL
    },
    diffbot: {
      token: values.DIFFBOT_TOKEN
    },
    tts: {
      apiKey: values.TTS_API_KEY ?? values.GEMINI_API_KEY,
      voice: values.TTS_VOICE
    }
  });
}
