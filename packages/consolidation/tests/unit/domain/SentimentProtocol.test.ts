import { describe, it, expect } from 'vitest';
import { Sentiment } from '@customer360/core';
import {
  buildPrompt,
  matchPositional,
  matchTagged,
  parseSentimentLabel,
  resolveSentiment,
  responseLines,
} from '../../../src/domain/services/SentimentProtocol.js';

describe('SentimentProtocol', () => {
  describe('buildPrompt', () => {
    it('should list texts as bullets in positional mode', () => {
      expect(buildPrompt(['great', 'terri\nble'], 'positional')).toBe(
        'Classify sentiment (Positive / Negative / Neutral) for each line:\n\n- great\n- terri ble\n',
      );
    });

    it('should number texts and ask for the tags back in tagged mode', () => {
      expect(buildPrompt(['great', '  terrible  '], 'tagged')).toBe(
        'Classify sentiment (Positive / Negative / Neutral) for each line. ' +
          'Answer with one line per item, starting with the [n] tag of the item:\n\n[1] great\n[2] terrible\n',
      );
    });
  });

  describe('parseSentimentLabel', () => {
    it.each([
      ['1. POSITIVE', Sentiment.POSITIVE],
      ['Negative', Sentiment.NEGATIVE],
      ['neutral-ish', Sentiment.NEUTRAL],
      ['positive and negative', Sentiment.POSITIVE],
      ['mixed', Sentiment.UNKNOWN],
    ])('should map %j to %s', (line, expected) => {
      expect(parseSentimentLabel(line)).toBe(expected);
    });
  });

  it('should drop blank response lines and trim the rest', () => {
    expect(responseLines(' Positive \n\n Negative\r\n')).toEqual(['Positive', 'Negative']);
  });

  describe('matchPositional', () => {
    it('should label items in line order', () => {
      expect(matchPositional(['Positive', 'Negative'], 2)).toEqual([Sentiment.POSITIVE, Sentiment.NEGATIVE]);
    });

    it('should leave items past the last line Unknown', () => {
      expect(matchPositional(['Positive'], 2)).toEqual([Sentiment.POSITIVE, Sentiment.UNKNOWN]);
    });
  });

  describe('matchTagged', () => {
    it('should match lines by tag regardless of order', () => {
      const lines = ['[2] Negative', '[1] Positive', '[1] Negative', '[7] Positive', 'noise'];
      expect(matchTagged(lines, 3)).toEqual([Sentiment.POSITIVE, Sentiment.NEGATIVE, Sentiment.UNKNOWN]);
    });

    it('should accept bulleted tags', () => {
      expect(matchTagged(['- [1] positive', '* [2] neutral'], 2)).toEqual([Sentiment.POSITIVE, Sentiment.NEUTRAL]);
    });

    it('should ignore tag zero', () => {
      expect(matchTagged(['[0] Positive'], 1)).toEqual([Sentiment.UNKNOWN]);
    });
  });

  describe('resolveSentiment', () => {
    it('should pick the most frequent label', () => {
      expect(resolveSentiment([Sentiment.NEGATIVE, Sentiment.POSITIVE, Sentiment.POSITIVE])).toBe(Sentiment.POSITIVE);
    });

    it('should resolve a tie to Neutral', () => {
      expect(resolveSentiment([Sentiment.POSITIVE, Sentiment.NEGATIVE])).toBe(Sentiment.NEUTRAL);
    });

    it('should ignore Unknown labels', () => {
      expect(resolveSentiment([Sentiment.UNKNOWN, Sentiment.UNKNOWN, Sentiment.NEGATIVE])).toBe(Sentiment.NEGATIVE);
    });

    it('should be Unknown without any known label', () => {
      expect(resolveSentiment([Sentiment.UNKNOWN])).toBe(Sentiment.UNKNOWN);
      expect(resolveSentiment([])).toBe(Sentiment.UNKNOWN);
    });
  });
});
