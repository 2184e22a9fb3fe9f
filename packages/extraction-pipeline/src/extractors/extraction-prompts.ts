import { DomainInferrer } from '../utils/domain-inferrer';

export type PromptStrategy = 'base' | 'paraphrase';

/**
 * One extraction attempt
 */
export interface Attempt {
  /**
   * 1-based attempt number
   */
  number: number;

  strategy: PromptStrategy;
}

/**
 * The first attempt uses the base prompt; later attempts ask for
 * aggressive paraphrasing
 */
export function planAttempt(number: number): Attempt {
  return { number, strategy: number <= 1 ? 'base' : 'paraphrase' };
}

const RESPONSE_SKELETON = [
  '{',
  '  "domains": [],',
  '  "principles": [],',
  '  "rules": [],',
  '  "claims": [],',
  '  "warnings": []',
  '}',
].join('\n');

const TEXT_FENCE = '-'.repeat(38);

/**
 * ExtractionPrompts - Builds system and user prompts for chunk extraction
 */
export class ExtractionPrompts {
  private readonly domains: readonly string[];

  /**
   * @param domains - Domain vocabulary offered to the model (default: the keyword table's domains)
   */
  constructor(domains: readonly string[] = DomainInferrer.domains) {
    this.domains = domains;
  }

  buildSystemPrompt(): string {
    return [
      'You extract operational knowledge from book excerpts.',
      'Respond with a single JSON object and nothing else.',
      'Never copy sentences from the excerpt; restate every item in your own, general wording.',
      `Allowed domains: ${this.domains.join(', ')}.`,
    ].join('\n');
  }

  buildUserPrompt(text: string, chapterIndex: number, attempt: Attempt): string {
    const sections = [
      `RETURN JSON WITH THIS EXACT STRUCTURE:\n\n${RESPONSE_SKELETON}`,
      `CHAPTER INDEX: ${chapterIndex}`,
      `TEXT (analyze, do not quote):\n${TEXT_FENCE}\n${text}\n${TEXT_FENCE}`,
      [
        'INSTRUCTIONS:',
        '1. Pick 1-3 domains from the allowed list.',
        '2. Extract principles, rules, decision criteria, claims and warnings the text teaches.',
        '3. Turn concrete examples into general statements.',
        '4. Paraphrase; never quote.',
        '5. Domains must not be empty. When the text teaches nothing, return empty lists for the other fields.',
      ].join('\n'),
    ];

    if (attempt.strategy === 'paraphrase') {
      sections.push(
        [
          'RETRY MODE:',
          '- Paraphrase aggressively',
          '- Reduce sentence length',
          '- Prefer generalized verbs',
        ].join('\n'),
      );
    }

    return sections.join('\n\n');
  }
}
