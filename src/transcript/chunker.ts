import { countTokens, type TokenCounter } from "../tokenizer.js";

/**
 * Split a transcript into chronological windows of roughly `maxTokens`.
 *
 * Words accumulate until the buffer goes over budget, then the buffer
 * (words joined by single spaces) is emitted. A window therefore ends with
 * the word that crossed the limit, and a lone word longer than the budget
 * becomes its own window instead of being cut. The buffer's count is kept
 * as a running sum of `counter(" " + word)` so long sessions chunk in
 * linear time.
 */
export function splitByTokens(
  text: string,
  maxTokens: number,
  counter: TokenCounter = countTokens,
): string[] {
  const budget = Math.max(1, maxTokens);
  const words = text.split(/\s+/).filter((w) => w.length > 0);

  const chunks: string[] = [];
  let buf: string[] = [];
  let bufTokens = 0;

  for (const word of words) {
    bufTokens += counter(buf.length === 0 ? word : ` ${word}`);
    buf.push(word);
    if (bufTokens > budget) {
      chunks.push(buf.join(" "));
      buf = [];
      bufTokens = 0;
    }
  }
  if (buf.length > 0) chunks.push(buf.join(" "));

  return chunks;
}
