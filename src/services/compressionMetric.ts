import { deflateRawSync } from 'zlib';

/**
 * Compression gain of a text fragment: raw UTF-8 bytes minus raw DEFLATE bytes,
 * floored at 0. Higher means more redundant text.
 *
 * Raw DEFLATE (no zlib header or Adler-32 trailer) keeps the six framing bytes
 * out of the gain, so short repetitive completions still score above zero.
 */
export function omega(text: string): number {
  if (text.length === 0) return 0;

  const raw = Buffer.from(text, 'utf8');
  return Math.max(0, raw.length - deflateRawSync(raw).length);
}
