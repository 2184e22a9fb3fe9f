/**
 * Names of the four item lists carried by every extraction result
 */
export const EXTRACTION_ITEM_KEYS = [
  'principles',
  'rules',
  'claims',
  'warnings',
] as const;

export type ExtractionItemKey = (typeof EXTRACTION_ITEM_KEYS)[number];

/**
 * JSON value as returned by the generation capability
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * A single extracted item
 *
 * The pipeline does not interpret item contents. Items are either plain
 * statements or objects such as `{ condition, action }`; both are compared
 * by normalized value when deduplicating.
 */
export type ExtractionItem = string | { [key: string]: JsonValue };

/**
 * Structured result of extracting one chunk
 *
 * @interface ExtractionResult
 */
export interface ExtractionResult {
  /**
   * 1 to 3 domain labels, unique
   * @type {string[]}
   */
  domains: string[];

  principles: ExtractionItem[];
  rules: ExtractionItem[];
  claims: ExtractionItem[];
  warnings: ExtractionItem[];

  /**
   * Set when the result was accepted although it repeats a long span of the
   * source text word for word
   * @type {string}
   */
  verbatimWarning?: string;

  /**
   * Unknown top-level keys returned by the model, kept as-is
   */
  extra?: Record<string, JsonValue>;
}
