const MAX_TEXT_LENGTH = 10_000;

export function sanitizeText(text: string): string {
  return text.replaceAll('\u0000', '').trim().slice(0, MAX_TEXT_LENGTH);
}

/** Lowercased words with surrounding punctuation removed. */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .map((word) => word.replace(/^[^\p{L}\p{N}']+|[^\p{L}\p{N}']+$/gu, ''))
    .filter((word) => word.length > 0);
}
