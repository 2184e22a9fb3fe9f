/**
 * TextNormalizer - Text normalization for comparison
 *
 * - Unicode normalization (NFC)
 * - Whitespace normalization (special spaces, line breaks, runs of spaces)
 * - Case folding for comparison keys
 */
export class TextNormalizer {
  /**
   * Normalizes text
   * - Converts special whitespace characters and line breaks to spaces
   * - Collapses consecutive spaces
   * - Trims leading and trailing spaces
   */
  static normalize(text: string): string {
    if (!text) return '';

    let normalized = text.normalize('NFC');

    // Zero-width space has no \s match
    normalized = normalized.replace(/[\t\u00A0\u2000-\u200B]/g, ' ');

    normalized = normalized.replace(/\s+/g, ' ');

    return normalized.trim();
  }

  /**
   * Normalized, lower-cased form used for duplicate and overlap checks
   */
  static forComparison(text: string): string {
    return this.normalize(text).toLowerCase();
  }

  /**
   * Split text into comparison words
   */
  static words(text: string): string[] {
    const normalized = this.forComparison(text);
    return normalized ? normalized.split(' ') : [];
  }
}
