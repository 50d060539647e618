export const THOUGHT_DELIMITER = '</think>';

const CODE_FENCE = '```';

export type DecodedObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is DecodedObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pulls the JSON object out of a chat answer. Reasoning output before a
 * `</think>` line and code fence lines are discarded. Returns `null` when no
 * JSON object remains.
 */
export function decodeModelAnswer(answer: string): DecodedObject | null {
  let lines = answer.split('\n');

  let delimiterIndex = -1;
  lines.forEach((line, index) => {
    if (line.trim() === THOUGHT_DELIMITER) {
      delimiterIndex = index;
    }
  });
  if (delimiterIndex >= 0) {
    lines = lines.slice(delimiterIndex + 1);
  }

  const body = lines.filter((line) => !line.trim().startsWith(CODE_FENCE)).join('\n');

  try {
    const parsed: unknown = JSON.parse(body);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}
