import { DamageLevel, DAMAGE_LEVELS } from '@incident-atlas/types';
import damageSynonyms from '../mappings/damage-synonyms.json';

interface Synonym {
  phrase: string;
  level: DamageLevel;
}

// Lowercase, every run of non-alphanumerics becomes one space
export function toPhrase(text: string): string {
  return text
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

/**
 * Resolves free-text damage descriptions to the damage enum.
 * Exact phrase match first, then the longest synonym occurring as whole words,
 * else `unknown`. Never fails.
 */
export class DamageClassifier {
  private readonly exact = new Map<string, DamageLevel>();
  // Longest phrase first
  private readonly byLength: Synonym[] = [];

  constructor(table: Partial<Record<DamageLevel, readonly string[]>> = damageSynonyms) {
    for (const level of DAMAGE_LEVELS) {
      for (const raw of table[level] ?? []) {
        const phrase = toPhrase(raw);
        if (!phrase || this.exact.has(phrase)) continue;
        this.exact.set(phrase, level);
        this.byLength.push({ phrase, level });
      }
    }
    this.byLength.sort((a, b) => b.phrase.length - a.phrase.length);
  }

  classify(text: string | null): DamageLevel {
    if (text === null) return DamageLevel.UNKNOWN;

    const phrase = toPhrase(text);
    if (!phrase) return DamageLevel.UNKNOWN;

    const exact = this.exact.get(phrase);
    if (exact) return exact;

    const padded = ` ${phrase} `;
    const match = this.byLength.find(synonym => padded.includes(` ${synonym.phrase} `));
    return match ? match.level : DamageLevel.UNKNOWN;
  }
}
