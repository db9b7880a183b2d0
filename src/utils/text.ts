/**
 * Whitespace-delimited word count. Stands in for model token count;
 * it is an approximation and is not meant to match the tokenizer.
 */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed === '' ? 0 : trimmed.split(/\s+/).length;
}
