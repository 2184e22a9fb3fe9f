import type {
  ExtractionItem,
  ExtractionResult,
  JsonValue,
} from '@chapterwise/model';

import { StructuralValidationError } from '../errors/extraction-error';
import {
  REQUIRED_RESPONSE_KEYS,
  extractionResponseSchema,
  jsonObjectSchema,
} from '../types/extraction-schema';

export interface ResponseParseOptions {
  /**
   * Maximum number of domains kept
   */
  maxDomains: number;

  /**
   * When set, domains outside this list are dropped
   */
  allowedDomains?: readonly string[];
}

const REASONING_BLOCK = /<think>[\s\S]*?<\/think>/gi;
const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * ExtractionResponseParser - Turns raw generator text into an
 * ExtractionResult
 *
 * Parsing tries the whole text, then a fenced code block, then the span
 * from the first "{" to the last "}". Reasoning blocks (`<think>...</think>`)
 * are removed first. The object must carry `domains`, `principles`, `rules`,
 * `claims` and `warnings`, each a list; anything else is a structural
 * failure. Other top-level fields are kept under `extra`.
 *
 * Domains may come as strings or as objects with a `name`; they are
 * lower-cased, de-duplicated and capped. An empty domain list is returned
 * as-is for the caller to fill in.
 */
export class ExtractionResponseParser {
  static parse(text: string, options: ResponseParseOptions): ExtractionResult {
    const json = this.extractJson(text);

    const object = jsonObjectSchema.safeParse(json);
    if (!object.success) {
      throw new StructuralValidationError('Response is not a JSON object');
    }

    const shape = extractionResponseSchema.safeParse(object.data);
    if (!shape.success) {
      const issues = shape.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      );
      throw new StructuralValidationError(
        `Response is missing required list fields (${issues.join('; ')})`,
        issues,
      );
    }

    const result: ExtractionResult = {
      domains: this.normalizeDomains(shape.data.domains, options),
      principles: this.normalizeItems(shape.data.principles),
      rules: this.normalizeItems(shape.data.rules),
      claims: this.normalizeItems(shape.data.claims),
      warnings: this.normalizeItems(shape.data.warnings),
    };

    const extra = this.collectExtra(object.data);
    if (extra) {
      result.extra = extra;
    }

    return result;
  }

  /**
   * Locate and parse the JSON payload in the response text
   *
   * @throws StructuralValidationError when no candidate parses
   */
  static extractJson(text: string): unknown {
    const cleaned = text.replace(REASONING_BLOCK, '').trim();
    if (!cleaned) {
      throw new StructuralValidationError('Response is empty');
    }

    for (const candidate of this.candidates(cleaned)) {
      try {
        return JSON.parse(candidate);
      } catch {
        // next candidate
      }
    }

    throw new StructuralValidationError('Response contains no parsable JSON');
  }

  private static *candidates(text: string): Generator<string> {
    yield text;

    const fenced = FENCED_BLOCK.exec(text);
    if (fenced) {
      yield fenced[1];
    }

    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start !== -1 && end > start) {
      yield text.slice(start, end + 1);
    }
  }

  private static normalizeDomains(
    raw: JsonValue[],
    options: ResponseParseOptions,
  ): string[] {
    const allowed = options.allowedDomains
      ? new Set(options.allowedDomains.map((d) => d.toLowerCase()))
      : undefined;
    const domains: string[] = [];

    for (const entry of raw) {
      const name = this.domainName(entry)?.trim().toLowerCase();
      if (!name || domains.includes(name)) {
        continue;
      }
      if (allowed && !allowed.has(name)) {
        continue;
      }
      domains.push(name);
    }

    return domains.slice(0, options.maxDomains);
  }

  private static domainName(entry: JsonValue): string | undefined {
    if (typeof entry === 'string') {
      return entry;
    }
    if (entry !== null && typeof entry === 'object' && !Array.isArray(entry)) {
      const name = entry.name;
      return typeof name === 'string' ? name : undefined;
    }
    return undefined;
  }

  /**
   * Keep strings and objects, stringify scalars, drop blanks, nulls and
   * nested lists
   */
  private static normalizeItems(raw: JsonValue[]): ExtractionItem[] {
    const items: ExtractionItem[] = [];

    for (const entry of raw) {
      if (typeof entry === 'string') {
        const trimmed = entry.trim();
        if (trimmed) {
          items.push(trimmed);
        }
      } else if (typeof entry === 'number' || typeof entry === 'boolean') {
        items.push(String(entry));
      } else if (
        entry !== null &&
        !Array.isArray(entry) &&
        Object.keys(entry).length > 0
      ) {
        items.push(entry);
      }
    }

    return items;
  }

  private static collectExtra(
    object: Record<string, JsonValue>,
  ): Record<string, JsonValue> | undefined {
    const known = new Set<string>(REQUIRED_RESPONSE_KEYS);
    const extra: Record<string, JsonValue> = {};
    let found = false;

    for (const [key, value] of Object.entries(object)) {
      if (!known.has(key)) {
        extra[key] = value;
        found = true;
      }
    }

    return found ? extra : undefined;
  }
}
