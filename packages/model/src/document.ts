/**
 * Source document
 *
 * Ordered sequence of page texts as produced by an upstream text extractor.
 * Immutable once loaded.
 *
 * @interface SourceDocument
 */
export interface SourceDocument {
  /**
   * Optional title, used for the single-chapter fallback
   * @type {string}
   */
  title?: string;

  /**
   * Raw page texts in reading order
   * @type {string[]}
   */
  pages: string[];
}

/**
 * Chapter of a source document
 *
 * Produced once per document by a splitter and consumed read-only by the
 * extraction pipeline.
 *
 * @interface Chapter
 */
export interface Chapter {
  /**
   * 1-based position of the chapter in the document
   * @type {number}
   */
  chapterIndex: number;

  /**
   * Stable identifier derived from the chapter content (SHA-256 hex)
   *
   * Checkpoints are keyed by this value, so the same text always resumes
   * from the same checkpoint.
   *
   * @type {string}
   */
  chapterId: string;

  /**
   * Chapter title if the splitter found one
   * @type {string}
   */
  title?: string;

  /**
   * Full chapter text
   * @type {string}
   */
  rawText: string;
}
