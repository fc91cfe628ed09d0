import type { ProcessArticleResponse } from "@readright/shared";
import type { StoredResult } from "../persistence/ArticleStore.js";

export function buildResponse(
  article: { title: string; simplifiedText: string; summary: string[] },
  stored: StoredResult
): ProcessArticleResponse {
  return {
    id: stored.databaseRecordId,
    title: article.title,
    simplifiedText: article.simplifiedText,
    summary: article.summary,
    audioId: stored.storageFileId,
    audioUrl: stored.audioUrl
  };
}
