/**
 * Greedy word wrap by character count
 * A word longer than the limit gets a line of its own
 *
 * @example
 * wrapWords("aaa bbb ccc", 7) // ["aaa bbb", "ccc"]
 */
export function wrapWords(text: string, maxChars: number): string[] {
  const lines: string[] = [];
  let line = "";

  for (const word of text.split(/\s+/).filter(Boolean)) {
    const candidate = line ? `${line} ${word}` : word;
    if (candidate.length > maxChars && line) {
      lines.push(line);
      line = word;
    } else {
      line = candidate;
    }
  }

  if (line) lines.push(line);
  return lines;
}
