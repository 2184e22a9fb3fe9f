import type {
  Chapter,
  ChapterResult,
  ChapterStatus,
  ExtractionResult,
  FailedChunk,
  VerbatimWarning,
} from '@chapterwise/model';

import { EXTRACTION_ITEM_KEYS } from '@chapterwise/model';

import { ItemDeduplicator } from '../utils/item-deduplicator';

export interface ChunkOutcomes {
  totalChunks: number;

  /**
   * Successful chunk results
   */
  completed: Array<{ chunkIndex: number; result: ExtractionResult }>;

  failed: FailedChunk[];

  /**
   * How many of the completed chunks came from a checkpoint
   */
  resumedChunks: number;
}

/**
 * ChapterAggregator - Merges chunk results into one ChapterResult
 *
 * Chunk results are merged in chunk order. Domains become a sorted union;
 * item lists are concatenated and de-duplicated (first occurrence wins).
 */
export class ChapterAggregator {
  static aggregate(chapter: Chapter, outcomes: ChunkOutcomes): ChapterResult {
    const completed = [...outcomes.completed].sort(
      (a, b) => a.chunkIndex - b.chunkIndex,
    );

    const domains = new Set<string>();
    const verbatimWarnings: VerbatimWarning[] = [];
    for (const { chunkIndex, result } of completed) {
      result.domains.forEach((domain) => domains.add(domain));
      if (result.verbatimWarning) {
        verbatimWarnings.push({ chunkIndex, message: result.verbatimWarning });
      }
    }

    const merged: ChapterResult = {
      chapterIndex: chapter.chapterIndex,
      chapterId: chapter.chapterId,
      title: chapter.title,
      status: 'ok',
      domains: [...domains].sort(),
      principles: [],
      rules: [],
      claims: [],
      warnings: [],
      totalChunks: outcomes.totalChunks,
      completedChunks: completed.length,
      resumedChunks: outcomes.resumedChunks,
      failedChunks: [...outcomes.failed].sort(
        (a, b) => a.chunkIndex - b.chunkIndex,
      ),
      verbatimWarnings,
    };

    for (const key of EXTRACTION_ITEM_KEYS) {
      merged[key] = ItemDeduplicator.dedupe(
        completed.flatMap(({ result }) => result[key]),
      );
    }

    merged.status = this.determineStatus(merged);
    return merged;
  }

  /**
   * failed: every chunk failed; partial: some did; otherwise ok when any
   * item was extracted, valid_empty when none was
   */
  static determineStatus(
    result: Pick<
      ChapterResult,
      'totalChunks' | 'failedChunks' | 'principles' | 'rules' | 'claims' | 'warnings'
    >,
  ): ChapterStatus {
    const failed = result.failedChunks.length;
    if (result.totalChunks > 0 && failed >= result.totalChunks) {
      return 'failed';
    }
    if (failed > 0) {
      return 'partial';
    }
    const hasItems = EXTRACTION_ITEM_KEYS.some((key) => result[key].length > 0);
    return hasItems ? 'ok' : 'valid_empty';
  }
}
