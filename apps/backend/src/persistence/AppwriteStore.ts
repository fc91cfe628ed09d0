import type { StoredArticle } from "@readright/shared";
import { z } from "zod";
import type { AppConfig } from "../config.js";
import { PersistenceError, describeError } from "../errors.js";
import type { NarrationAudio } from "../speech/SpeechSynthesizer.js";
import type { ArticleStore, PersistInput, StoredResult } from "./ArticleStore.js";

/** Appwrite rejects single requests above 5 MiB; larger files go up in ranges. */
export const UPLOAD_CHUNK_BYTES = 5 * 1024 * 1024;
const AUDIO_FILE_NAME = "narration.mp3";

const documentSchema = z.object({ $id: z.string().min(1) });

const rowSchema = z.object({
  $id: z.string(),
  $createdAt: z.string(),
  title: z.string(),
  simplifiedText: z.string(),
  summary: z.array(z.string()),
  audioId: z.string(),
  audioUrl: z.string()
});

/** Appwrite's error `type` for a row id that does not exist in a table that does. */
const ROW_NOT_FOUND = "row_not_found";

interface Failure {
  type?: string;
  description: string;
}

async function readFailure(response: Response): Promise<Failure> {
  try {
    const body = (await response.json()) as { message?: unknown; type?: unknown };
    const type = typeof body.type === "string" ? body.type : undefined;
    if (typeof body.message === "string" && body.message) {
      return { type, description: `${response.status} ${body.message}` };
    }
    return { type, description: `${response.status} ${response.statusText}`.trim() };
  } catch {
    // Not JSON; fall through to the status line.
  }
  return { description: `${response.status} ${response.statusText}`.trim() };
}

export class AppwriteStore implements ArticleStore {
  constructor(private readonly config: AppConfig["appwrite"]) {}

  private headers(extra: Record<string, string> = {}): Record<string, string> {
    return {
      "X-Appwrite-Project": this.config.projectId,
      "X-Appwrite-Key": this.config.apiKey,
      ...extra
    };
  }

  private async request(action: string, url: string, init: RequestInit): Promise<Response> {
    try {
      return await fetch(url, init);
    } catch (error) {
      throw new PersistenceError(`${action} failed: ${describeError(error)}`, { cause: error });
    }
  }

  private async send(action: string, url: string, init: RequestInit): Promise<Response> {
    const response = await this.request(action, url, init);
    if (!response.ok) {
      const failure = await readFailure(response);
      throw new PersistenceError(`${action} failed: ${failure.description}`);
    }
    return response;
  }

  private async parseId(action: string, response: Response): Promise<string> {
    const parsed = documentSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new PersistenceError(`${action} returned no id`);
    }
    return parsed.data.$id;
  }

  audioUrl(fileId: string): string {
    const { endpoint, bucketId, projectId } = this.config;
    return `${endpoint}/storage/buckets/${bucketId}/files/${fileId}/view?project=${encodeURIComponent(projectId)}`;
  }

  async uploadAudio(audio: NarrationAudio): Promise<string> {
    const url = `${this.config.endpoint}/storage/buckets/${this.config.bucketId}/files`;
    const total = audio.bytes.length;
    let fileId = "unique()";

    for (let start = 0; start === 0 || start < total; start += UPLOAD_CHUNK_BYTES) {
      const end = Math.min(start + UPLOAD_CHUNK_BYTES, total);
      const form = new FormData();
      form.append("fileId", fileId);
      form.append("file", new Blob([audio.bytes.slice(start, end)], { type: audio.mimeType }), AUDIO_FILE_NAME);

      const extra: Record<string, string> = {};
      if (total > UPLOAD_CHUNK_BYTES) {
        extra["Content-Range"] = `bytes ${start}-${end - 1}/${total}`;
        if (start > 0) {
          extra["X-Appwrite-ID"] = fileId;
        }
      }

      const response = await this.send("Audio upload", url, {
        method: "POST",
        headers: this.headers(extra),
        body: form
      });
      fileId = await this.parseId("Audio upload", response);
    }
    return fileId;
  }

  async createRow(data: Omit<StoredArticle, "id" | "createdAt">): Promise<string> {
    const { endpoint, databaseId, tableId } = this.config;
    const response = await this.send("Row write", `${endpoint}/tablesdb/${databaseId}/tables/${tableId}/rows`, {
      method: "POST",
      headers: this.headers({ "Content-Type": "application/json" }),
      body: JSON.stringify({ rowId: "unique()", data })
    });
    return this.parseId("Row write", response);
  }

  async persist(input: PersistInput): Promise<StoredResult> {
    const storageFileId = await this.uploadAudio(input.audio);
    const audioUrl = this.audioUrl(storageFileId);
    const databaseRecordId = await this.createRow({
      title: input.title,
      simplifiedText: input.simplifiedText,
      summary: input.summary,
      audioId: storageFileId,
      audioUrl
    });
    return { storageFileId, databaseRecordId, audioUrl };
  }

  async find(id: string): Promise<StoredArticle | null> {
    const { endpoint, databaseId, tableId } = this.config;
    const response = await this.request(
      "Row read",
      `${endpoint}/tablesdb/${databaseId}/tables/${tableId}/rows/${encodeURIComponent(id)}`,
      { method: "GET", headers: this.headers() }
    );
    if (!response.ok) {
      const failure = await readFailure(response);
      // A missing database or table also answers 404; only a missing row is "not found".
      if (response.status === 404 && failure.type === ROW_NOT_FOUND) {
        return null;
      }
      throw new PersistenceError(`Row read failed: ${failure.description}`);
    }

    const parsed = rowSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new PersistenceError(`Row ${id} does not match the article shape`);
    }
    const row = parsed.data;
    return {
      id: row.$id,
      title: row.title,
      simplifiedText: row.simplifiedText,
      summary: row.summary,
      audioId: row.audioId,
      audioUrl: row.audioUrl,
      createdAt: row.$createdAt
    };
  }
}
