import type { ExtractionItem, JsonValue } from '@chapterwise/model';

import { TextNormalizer } from './text-normalizer';

/**
 * ItemDeduplicator - Order-preserving de-duplication of extracted items
 *
 * Strings compare by their normalized, lower-cased text. Objects compare by
 * a canonical JSON form with sorted keys and normalized string values.
 * The first occurrence wins.
 */
export class ItemDeduplicator {
  static dedupe(items: readonly ExtractionItem[]): ExtractionItem[] {
    const seen = new Set<string>();
    const unique: ExtractionItem[] = [];

    for (const item of items) {
      const key = this.keyOf(item);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      unique.push(item);
    }

    return unique;
  }

  static keyOf(item: ExtractionItem): string {
    if (typeof item === 'string') {
      return `s:${TextNormalizer.forComparison(item)}`;
    }
    return `o:${JSON.stringify(this.canonicalize(item))}`;
  }

  private static canonicalize(value: JsonValue): JsonValue {
    if (typeof value === 'string') {
      return TextNormalizer.forComparison(value);
    }
    if (Array.isArray(value)) {
      return value.map((entry) => this.canonicalize(entry));
    }
    if (value === null || typeof value !== 'object') {
      return value;
    }

    const sorted: { [key: string]: JsonValue } = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = this.canonicalize(value[key]);
    }
    return sorted;
  }
}
