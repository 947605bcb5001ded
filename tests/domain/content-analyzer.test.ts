import { describe, it, expect } from '@jest/globals';
import { ContentAnalyzer, riskLevelFor, tokenize } from '@contractor-connect/core';

describe('ContentAnalyzer', () => {
  const analyzer = new ContentAnalyzer();

  it('should pass ordinary positive text', () => {
    const result = analyzer.analyze('The plumber did great work on our kitchen');

    expect(result).toEqual({
      profanityScore: 0,
      spamScore: 0,
      toxicityScore: 0,
      sentimentScore: 0.625,
      riskLevel: 'low',
      requiresReview: false,
      isApproved: true,
      flags: [],
    });
  });

  it('should flag dense profanity as critical', () => {
    const result = analyzer.analyze('This is a scam and a fraud');

    expect(result.profanityScore).toBe(1);
    expect(result.riskLevel).toBe('critical');
    expect(result.requiresReview).toBe(true);
    expect(result.isApproved).toBe(false);
    expect(result.flags).toEqual(['profanity']);
  });

  it('should approve a single mild hit as medium risk', () => {
    const result = analyzer.analyze('the fake tile was replaced by the crew last week');

    expect(result.profanityScore).toBe(0.5);
    expect(result.riskLevel).toBe('medium');
    expect(result.isApproved).toBe(true);
    expect(result.requiresReview).toBe(false);
    expect(result.flags).toEqual([]);
  });

  it('should count spam indicators', () => {
    // pattern, shouting, punctuation and a repeated character
    const result = analyzer.analyze('BUY NOW!!! CLICK HERE!!!!');

    expect(result.spamScore).toBe(0.8);
    expect(result.riskLevel).toBe('critical');
    expect(result.flags).toEqual(['spam']);
  });

  it('should measure spam ratios in characters, not UTF-16 units', () => {
    const plain = new ContentAnalyzer({ profanity: [], toxic: [], positive: [], negative: [], spamPatterns: [] });

    // 7 capitals in 13 characters; the emoji alone take 8 UTF-16 units
    expect(plain.analyze('WOW NICE 🔨🏠🚿🎉').spamScore).toBe(0.2);
    // 1 mark in 9 characters
    expect(plain.analyze('good! 🔨🏠🚿').spamScore).toBe(0.2);
  });

  it('should score toxicity with a higher weight', () => {
    const result = analyzer.analyze('you are an idiot');

    expect(result.toxicityScore).toBe(1);
    expect(result.flags).toEqual(['toxicity']);
  });

  it('should clamp negative sentiment at -1', () => {
    expect(analyzer.analyze('bad bad terrible').sentimentScore).toBe(-1);
  });

  it('should score empty text as clean', () => {
    const result = analyzer.analyze('');

    expect(result.riskLevel).toBe('low');
    expect(result.spamScore).toBe(0);
    expect(result.sentimentScore).toBe(0);
  });

  it('should use a supplied lexicon', () => {
    const custom = new ContentAnalyzer({
      profanity: ['darn'],
      toxic: [],
      positive: [],
      negative: [],
      spamPatterns: [],
    });

    expect(custom.analyze('darn').profanityScore).toBe(1);
    expect(custom.analyze('scam').profanityScore).toBe(0);
  });
});

describe('tokenize', () => {
  it('should lowercase and split on word boundaries', () => {
    expect(tokenize("Hello, World! It's")).toEqual(['hello', 'world', 'it', 's']);
  });
});

describe('riskLevelFor', () => {
  it('should map score thresholds to levels', () => {
    expect(riskLevelFor(0.29)).toBe('low');
    expect(riskLevelFor(0.3)).toBe('medium');
    expect(riskLevelFor(0.6)).toBe('high');
    expect(riskLevelFor(0.8)).toBe('critical');
  });
});
