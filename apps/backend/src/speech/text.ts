/** Google caps a synthesis request at 5000 bytes of input. */
export const MAX_REQUEST_BYTES = 4500;

function byteLength(value: string): number {
  return Buffer.byteLength(value, "utf8");
}

/** Strips the Markdown the model tends to leave behind so it is not read aloud. */
export function cleanForSpeech(text: string): string {
  return text
    .replace(/(\*\*|\*|__|_)/g, "")
    .replace(/^#+\s*/gm, "")
    .replace(/[`>~]/g, "")
    .trim();
}

function splitOversized(word: string, maxBytes: number): string[] {
  if (byteLength(word) <= maxBytes) {
    return [word];
  }
  const pieces: string[] = [];
  let current = "";
  for (const char of word) {
    if (current && byteLength(current + char) > maxBytes) {
      pieces.push(current);
      current = "";
    }
    current += char;
  }
  if (current) {
    pieces.push(current);
  }
  return pieces;
}

/**
 * Packs sentences into requests no larger than `maxBytes`. A sentence that is
 * too long on its own is broken between words.
 */
export function splitForSpeech(text: string, maxBytes = MAX_REQUEST_BYTES): string[] {
  const chunks: string[] = [];
  let current = "";

  const append = (piece: string) => {
    const candidate = current ? `${current} ${piece}` : piece;
    if (byteLength(candidate) <= maxBytes) {
      current = candidate;
      return;
    }
    chunks.push(current);
    current = piece;
  };

  for (const sentence of text.split(/(?<=[.!?])\s+|\n+/)) {
    const trimmed = sentence.trim();
    if (!trimmed) continue;
    if (byteLength(trimmed) <= maxBytes) {
      append(trimmed);
      continue;
    }
    for (const word of trimmed.split(/\s+/)) {
      splitOversized(word, maxBytes).forEach(append);
    }
  }

  if (current) {
    chunks.push(current);
  }
  return chunks;
}
