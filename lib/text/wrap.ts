export const NARRATION_WIDTH = 88;

const WHITESPACE_CHAR_REGEX = /\s/g;
const SPACE_RUN_REGEX = /( +)/;

function splitLongWord(word: string, width: number): string[] {
  const chunks: string[] = [];
  for (let start = 0; start < word.length; start += width) {
    chunks.push(word.slice(start, start + width));
  }
  return chunks;
}

/**
 * Greedy word wrap. Every whitespace character becomes a space and runs of
 * spaces between words on a line are kept as written; whitespace is only
 * dropped where a line breaks. Words longer than `width` are split.
 */
export function wrapText(text: string, width: number = NARRATION_WIDTH): string {
  if (!Number.isInteger(width) || width < 1) {
    throw new RangeError(`width must be a positive integer, got ${width}`);
  }

  const chunks = text
    .replace(WHITESPACE_CHAR_REGEX, " ")
    .split(SPACE_RUN_REGEX)
    .filter((chunk) => chunk.length > 0);

  const lines: string[] = [];
  let current = "";

  const breakLine = () => {
    const line = current.trimEnd();
    if (line) lines.push(line);
    current = "";
  };

  for (const chunk of chunks) {
    if (chunk.startsWith(" ")) {
      // Leading whitespace on a fresh line is dropped
      if (!current) continue;
      if (current.length + chunk.length <= width) {
        current += chunk;
      } else {
        breakLine();
      }
      continue;
    }

    const pieces = chunk.length > width ? splitLongWord(chunk, width) : [chunk];
    for (const piece of pieces) {
      if (current.length + piece.length > width) breakLine();
      current += piece;
    }
  }

  breakLine();
  return lines.join("\n");
}
