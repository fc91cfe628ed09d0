const BULLET_MARKER = /^\s*(?:[-*•+]|\d+[.)])\s+/;

/** Turns the model's bullet list into plain lines, in order. */
export function parseBullets(raw: string): string[] {
  return raw
    .split(/\r?\n/)
    .map((line) =>
      line
        .replace(BULLET_MARKER, "")
        .replace(/(\*\*|__)(.*?)\1/g, "$2")
        .trim()
    )
    .filter(Boolean);
}
