import domainKeywords from '../config/domain-keywords.json';
import { DEFAULT_MAX_DOMAINS, FALLBACK_DOMAIN } from '../config/constants';

/**
 * DomainInferrer - Keyword-based domain guess for chunks whose response
 * carries no domains
 *
 * Each domain scores the number of keyword occurrences in the lower-cased
 * text. Domains with a positive score are returned highest first; ties keep
 * the table order. When nothing matches, the fallback domain is returned.
 * With an allowed vocabulary only its domains are scored, and the fallback is
 * the first allowed domain unless the default fallback is itself allowed.
 */
export class DomainInferrer {
  static readonly KEYWORDS: Readonly<Record<string, readonly string[]>> =
    domainKeywords;

  static get domains(): string[] {
    return Object.keys(this.KEYWORDS);
  }

  static infer(
    text: string,
    maxDomains: number = DEFAULT_MAX_DOMAINS,
    allowedDomains?: readonly string[],
  ): string[] {
    const allowed = allowedDomains?.map((d) => d.trim().toLowerCase());
    const lowered = text.toLowerCase();
    const scored: Array<{ domain: string; score: number }> = [];

    for (const [domain, keywords] of Object.entries(this.KEYWORDS)) {
      if (allowed && !allowed.includes(domain)) {
        continue;
      }
      let score = 0;
      for (const keyword of keywords) {
        score += this.countOccurrences(lowered, keyword);
      }
      if (score > 0) {
        scored.push({ domain, score });
      }
    }

    if (scored.length === 0) {
      return [this.fallbackFor(allowed)];
    }

    return scored
      .sort((a, b) => b.score - a.score)
      .slice(0, maxDomains)
      .map(({ domain }) => domain);
  }

  private static fallbackFor(allowed?: readonly string[]): string {
    if (!allowed || allowed.length === 0 || allowed.includes(FALLBACK_DOMAIN)) {
      return FALLBACK_DOMAIN;
    }
    return allowed[0];
  }

  private static countOccurrences(text: string, keyword: string): number {
    return text.split(keyword).length - 1;
  }
}
