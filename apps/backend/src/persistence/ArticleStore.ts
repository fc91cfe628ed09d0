import type { StoredArticle } from "@readright/shared";
import type { NarrationAudio } from "../speech/SpeechSynthesizer.js";

export interface PersistInput {
  audio: NarrationAudio;
  title: string;
  simplifiedText: string;
  summary: string[];
}

export interface StoredResult {
  storageFileId: string;
  databaseRecordId: string;
  audioUrl: string;
}

export interface ArticleStore {
  /**
   * Uploads the audio, then writes the row that points at it. A failed row
   * write leaves the uploaded file behind.
   */
  persist(input: PersistInput): Promise<StoredResult>;
  find(id: string): Promise<StoredArticle | null>;
}
