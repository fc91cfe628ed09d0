export const REWRITE_PROMPT =
  "Rewrite this article to be dyslexia-friendly with large spacing and easy-to-read formatting. " +
  "Do not add any headings, labels, or commentary. Only output the rewritten article:";

export const SUMMARY_PROMPT =
  "Summarize this article in concise bullet points only. " +
  "Do not add any introduction or labels, just the bullets:";

export const TITLE_PROMPT =
  "Generate a concise and descriptive title for the following article only. " +
  "Do not add any additional commentary or explanation. Just the title:";

export function buildPrompt(instruction: string, text: string): string {
  return `${instruction}\n\n${text}`;
}
