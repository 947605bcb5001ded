/**
 * ContentAnalyzer - heuristic scoring of user-written text
 *
 * Pure and synchronous; the moderation service persists the results.
 */

import type { ContentAnalysis, RiskLevel } from '../entities/moderation.js';
import { loadModerationLexicon, type ModerationLexicon } from '../fixtures.js';

const REPEATED_CHARACTER = /(.)\1{3,}/;

export class ContentAnalyzer {
  private readonly profanity: ReadonlySet<string>;
  private readonly toxic: ReadonlySet<string>;
  private readonly positive: ReadonlySet<string>;
  private readonly negative: ReadonlySet<string>;
  private readonly spamPatterns: readonly RegExp[];

  constructor(lexicon: ModerationLexicon = loadModerationLexicon()) {
    this.profanity = new Set(lexicon.profanity);
    this.toxic = new Set(lexicon.toxic);
    this.positive = new Set(lexicon.positive);
    this.negative = new Set(lexicon.negative);
    this.spamPatterns = lexicon.spamPatterns.map((pattern) => new RegExp(pattern, 'i'));
  }

  public analyze(text: string): ContentAnalysis {
    const words = tokenize(text);
    const profanityScore = this.ratioScore(words, this.profanity, 5);
    const toxicityScore = this.ratioScore(words, this.toxic, 10);
    const spamScore = this.spamScore(text);
    const sentimentScore = this.sentimentScore(words);
    const riskLevel = riskLevelFor(Math.max(profanityScore, spamScore, toxicityScore));

    const scores: Record<string, number> = {
      profanity: profanityScore,
      spam: spamScore,
      toxicity: toxicityScore,
    };

    return {
      profanityScore,
      spamScore,
      toxicityScore,
      sentimentScore,
      riskLevel,
      requiresReview: riskLevel === 'high' || riskLevel === 'critical',
      isApproved: riskLevel === 'low' || riskLevel === 'medium',
      flags: Object.keys(scores).filter((name) => (scores[name] ?? 0) > 0.5),
    };
  }

  private ratioScore(words: string[], lexicon: ReadonlySet<string>, scale: number): number {
    if (words.length === 0) {
      return 0;
    }
    const hits = words.filter((word) => lexicon.has(word)).length;
    return Math.min((hits / words.length) * scale, 1);
  }

  private spamScore(text: string): number {
    if (text === '') {
      return 0;
    }
    let indicators = this.spamPatterns.filter((pattern) => pattern.test(text)).length;
    // Ratios count code points so astral characters (emoji) weigh one each
    const chars = Array.from(text);

    if (chars.length > 10) {
      const uppercase = chars.filter((char) => char !== char.toLowerCase()).length;
      if (uppercase / chars.length > 0.5) {
        indicators++;
      }
    }

    const punctuation = chars.filter((char) => char === '!' || char === '?').length;
    if (punctuation / chars.length > 0.1) {
      indicators++;
    }

    if (REPEATED_CHARACTER.test(text)) {
      indicators++;
    }

    return Math.min(indicators / 5, 1);
  }

  private sentimentScore(words: string[]): number {
    if (words.length === 0) {
      return 0;
    }
    const positive = words.filter((word) => this.positive.has(word)).length;
    const negative = words.filter((word) => this.negative.has(word)).length;
    return Math.max(-1, Math.min(1, ((positive - negative) / words.length) * 5));
  }
}

export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(/\b\w+\b/g) ?? []).slice();
}

export function riskLevelFor(maxScore: number): RiskLevel {
  if (maxScore >= 0.8) {
    return 'critical';
  }
  if (maxScore >= 0.6) {
    return 'high';
  }
  if (maxScore >= 0.3) {
    return 'medium';
  }
  return 'low';
}
