/**
 * TextChunker - Splits chapter text into bounded chunks
 *
 * Each chunk is cut at the last paragraph break ("\n\n") inside its window,
 * or at the window end when the window has none. Chunks are raw slices of the
 * input (so concatenating them yields the input minus dropped blank chunks),
 * and whitespace-only chunks are dropped. The split depends only on the text
 * and the size limit, which keeps chunk indices stable across runs.
 */
export class TextChunker {
  static readonly PARAGRAPH_BREAK = '\n\n';

  static split(text: string, maxChars: number): string[] {
    if (!Number.isInteger(maxChars) || maxChars < 1) {
      throw new RangeError(`maxChars must be a positive integer, got ${maxChars}`);
    }

    const chunks: string[] = [];
    let start = 0;

    while (start < text.length) {
      const end = Math.min(start + maxChars, text.length);
      let cut = end;

      if (end < text.length) {
        const breakAt = text.lastIndexOf(
          this.PARAGRAPH_BREAK,
          end - this.PARAGRAPH_BREAK.length,
        );
        if (breakAt > start) {
          cut = breakAt;
        } else if (cut - 1 > start && this.isHighSurrogate(text, cut - 1)) {
          // Keep surrogate pairs whole
          cut--;
        }
      }

      const chunk = text.slice(start, cut);
      if (chunk.trim()) {
        chunks.push(chunk);
      }
      start = cut;
    }

    return chunks;
  }

  private static isHighSurrogate(text: string, index: number): boolean {
    const code = text.charCodeAt(index);
    return code >= 0xd800 && code <= 0xdbff;
  }
}
