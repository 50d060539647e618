export const DEFAULT_MAX_CHARS = 1000;

const PARAGRAPH_BREAK = /\n\s*\n/;
const JOINER = '\n\n';

export function splitParagraphs(text: string): string[] {
  return text
    .split(PARAGRAPH_BREAK)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0);
}

/**
 * Greedily packs consecutive paragraphs into chunks of at most `maxChars`
 * characters, counting the blank line between them. A paragraph longer than
 * the budget becomes a chunk of its own.
 */
export function mergeParagraphs(paragraphs: readonly string[], maxChars = DEFAULT_MAX_CHARS): string[] {
  const chunks: string[] = [];
  let current = '';

  for (const paragraph of paragraphs) {
    const candidateLength = current
      ? current.length + JOINER.length + paragraph.length
      : paragraph.length;

    if (candidateLength <= maxChars) {
      current = current ? `${current}${JOINER}${paragraph}` : paragraph;
      continue;
    }

    if (current) {
      chunks.push(current);
    }
    if (paragraph.length > maxChars) {
      chunks.push(paragraph);
      current = '';
    } else {
      current = paragraph;
    }
  }

  if (current) {
    chunks.push(current);
  }
  return chunks;
}

export function chunkText(text: string, maxChars = DEFAULT_MAX_CHARS): string[] {
  return mergeParagraphs(splitParagraphs(text), maxChars);
}
