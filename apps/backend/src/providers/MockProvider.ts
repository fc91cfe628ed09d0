import type { LLMProvider } from "./LLMProvider.js";

function trimWords(value: string, maxWords = 60): string {
  const words = value.trim().split(/\s+/);
  return words.slice(0, maxWords).join(" ");
}

function sentences(value: string): string[] {
  return value
    .replace(/([.!?])\s+/g, "$1\n")
    .split("\n")
    .map((sentence) => sentence.trim())
    .filter(Boolean);
}

export class MockProvider implements LLMProvider {
  readonly name = "mock" as const;

  async rewrite(text: string): Promise<string> {
    return sentences(trimWords(text, 45)).join("\n\n");
  }

  async summarize(text: string): Promise<string> {
    return sentences(text)
      .slice(0, 3)
      .map((sentence) => `- ${trimWords(sentence, 20)}`)
      .join("\n");
  }

  async title(text: string): Promise<string> {
    return trimWords(text, 8);
  }
}
