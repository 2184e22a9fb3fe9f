import type { ExtractionItem, ExtractionResult } from '@chapterwise/model';

import { EXTRACTION_ITEM_KEYS } from '@chapterwise/model';

import {
  DEFAULT_VERBATIM_MAX_WORDS,
  DEFAULT_VERBATIM_MIN_WORDS,
} from '../config/constants';
import { TextNormalizer } from '../utils/text-normalizer';

export interface VerbatimCheckOptions {
  /**
   * Shortest word run that counts as copied (default: 12)
   */
  minWords?: number;

  /**
   * Longest word run compared (default: 20)
   */
  maxWords?: number;
}

export interface VerbatimCheckResult {
  isVerbatim: boolean;
  phrase?: string;
  message?: string;
}

const PHRASE_PREVIEW_LENGTH = 80;

/**
 * VerbatimValidator - Detects long word runs copied from the source
 *
 * Source and extracted texts are compared word by word after whitespace
 * normalization and lower-casing. Any shared run of `minWords` to
 * `maxWords` words is reported. The check is advisory: callers attach the
 * message to the result rather than rejecting it.
 */
export class VerbatimValidator {
  static check(
    result: Pick<ExtractionResult, 'principles' | 'rules' | 'claims' | 'warnings'>,
    sourceText: string,
    options: VerbatimCheckOptions = {},
  ): VerbatimCheckResult {
    const minWords = options.minWords ?? DEFAULT_VERBATIM_MIN_WORDS;
    const maxWords = options.maxWords ?? DEFAULT_VERBATIM_MAX_WORDS;

    const sourceWords = TextNormalizer.words(sourceText);
    if (sourceWords.length < minWords) {
      return { isVerbatim: false };
    }

    const sourceGrams = new Set<string>();
    const longest = Math.min(maxWords, sourceWords.length);
    for (let n = minWords; n <= longest; n++) {
      for (let i = 0; i + n <= sourceWords.length; i++) {
        sourceGrams.add(sourceWords.slice(i, i + n).join(' '));
      }
    }

    for (const text of this.collectTexts(result)) {
      const words = TextNormalizer.words(text);
      const upper = Math.min(maxWords, words.length);
      for (let n = minWords; n <= upper; n++) {
        for (let i = 0; i + n <= words.length; i++) {
          const phrase = words.slice(i, i + n).join(' ');
          if (sourceGrams.has(phrase)) {
            return {
              isVerbatim: true,
              phrase,
              message: `Verbatim phrase detected: '${phrase.slice(0, PHRASE_PREVIEW_LENGTH)}...'`,
            };
          }
        }
      }
    }

    return { isVerbatim: false };
  }

  /**
   * Texts to compare: string items as-is, object items as their string
   * fields joined by spaces
   */
  static collectTexts(
    result: Pick<ExtractionResult, 'principles' | 'rules' | 'claims' | 'warnings'>,
  ): string[] {
    const texts: string[] = [];
    for (const key of EXTRACTION_ITEM_KEYS) {
      for (const item of result[key]) {
        const text = this.itemText(item);
        if (text) {
          texts.push(text);
        }
      }
    }
    return texts;
  }

  private static itemText(item: ExtractionItem): string {
    if (typeof item === 'string') {
      return item;
    }
    return Object.values(item)
      .filter((value): value is string => typeof value === 'string')
      .join(' ');
  }
}
