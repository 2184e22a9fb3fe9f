import type { Chapter, SourceDocument } from '@chapterwise/model';

import { contentHash } from '../utils/content-hash';

/**
 * Separator placed between pages when a document is flattened
 */
export const PAGE_SEPARATOR = '\n\f\n';

/**
 * Line-start headings that open a new chapter, in priority order
 */
const HEADING_PATTERNS: readonly RegExp[] = [
  /^(THE\s+[A-Z ]+BOOK)\b/gm,
  /^(BOOK\s+[IVXLCDM]+)\b/gm,
  /^(CHAPTER\s+\d+)\b/gm,
  /^(THE\s+[A-Z]+)\b/gm,
];

interface Heading {
  position: number;
  title: string;
}

/**
 * ChapterSplitter - Heading-based chapter detection
 *
 * Splits text at upper-case headings such as "THE FIRST BOOK", "BOOK IV"
 * or "CHAPTER 3". With fewer than two headings the whole text is one
 * chapter. Text before the first heading becomes its own chapter when it is
 * not blank. Chapter ids are content hashes, so they stay stable across
 * runs for unchanged text.
 */
export class ChapterSplitter {
  static fromDocument(document: SourceDocument): Chapter[] {
    return this.split(document.pages.join(PAGE_SEPARATOR), document.title);
  }

  static split(text: string, documentTitle?: string): Chapter[] {
    if (!text.trim()) {
      return [];
    }

    const headings = this.findHeadings(text);
    if (headings.length <= 1) {
      return [this.toChapter(1, text, documentTitle)];
    }

    const sections: Array<{ text: string; title?: string }> = [];
    const preamble = text.slice(0, headings[0].position).trim();
    if (preamble) {
      sections.push({ text: preamble, title: documentTitle });
    }

    headings.forEach((heading, i) => {
      const end = i + 1 < headings.length ? headings[i + 1].position : text.length;
      const body = text.slice(heading.position, end).trim();
      if (body) {
        sections.push({ text: body, title: heading.title });
      }
    });

    return sections.map((section, i) =>
      this.toChapter(i + 1, section.text, section.title),
    );
  }

  /**
   * Headings sorted by position; at a shared position the earlier pattern wins
   */
  static findHeadings(text: string): Heading[] {
    const byPosition = new Map<number, string>();

    for (const pattern of HEADING_PATTERNS) {
      for (const match of text.matchAll(pattern)) {
        if (match.index !== undefined && !byPosition.has(match.index)) {
          byPosition.set(match.index, match[1].trim());
        }
      }
    }

    return [...byPosition.entries()]
      .sort(([a], [b]) => a - b)
      .map(([position, title]) => ({ position, title }));
  }

  private static toChapter(
    chapterIndex: number,
    rawText: string,
    title?: string,
  ): Chapter {
    return {
      chapterIndex,
      chapterId: contentHash(rawText),
      title,
      rawText,
    };
  }
}
