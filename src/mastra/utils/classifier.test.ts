import { describe, it, expect } from 'vitest';
import { DocumentClassifier } from './classifier.js';

const classifier = new DocumentClassifier();

const LEGAL_SENTENCE =
  'The tenant accepts this agreement pursuant to section 4 and every obligation under the contract.';
const TECHNICAL_SENTENCE =
  'The api server reads the configuration parameters and the database system stores metrics.';

function filler(count: number): string {
  return Array.from({ length: count }, () => 'word').join(' ');
}

describe('DocumentClassifier.classify', () => {
  it('classifies dense legal vocabulary as legal', () => {
    // 5 sentences x 15 words, 5 legal markers each, padded to 100 words
    const content = [...Array.from({ length: 5 }, () => LEGAL_SENTENCE), filler(25)].join(' ');
    expect(classifier.classify(content)).toBe('legal');
  });

  it('classifies technical vocabulary as technical', () => {
    expect(classifier.classify(TECHNICAL_SENTENCE)).toBe('technical');
  });

  it('classifies list-heavy content as structured', () => {
    const content = '# Title\n- first item here\n- second item here\n- third item here';
    expect(classifier.classify(content)).toBe('structured');
  });

  it('returns mixed when more than one family scores high', () => {
    expect(classifier.classify(`${LEGAL_SENTENCE}\n\n${TECHNICAL_SENTENCE}`)).toBe('mixed');
  });

  it('classifies long unstructured paragraphs as narrative', () => {
    const paragraph = 'The river ran quietly past the old mill '.repeat(8).trim();
    expect(classifier.classify(`${paragraph}\n\n${paragraph}`)).toBe('narrative');
  });

  it('returns unknown for short plain text', () => {
    expect(classifier.classify('short text')).toBe('unknown');
  });

  it('returns unknown for empty content', () => {
    expect(classifier.classify('')).toBe('unknown');
  });

  it('applies a legal filename hint', () => {
    expect(classifier.classify('plain words only here', 'lease-contract.txt')).toBe('legal');
  });

  it('applies a technical filename hint', () => {
    expect(classifier.classify('plain words only here', 'api-manual.md')).toBe('technical');
  });

  it('does not throw on malformed unicode', () => {
    expect(classifier.classify('broken \uD800 text')).toBe('unknown');
  });
});

describe('DocumentClassifier.score', () => {
  it('normalizes match counts per thousand words', () => {
    const scores = classifier.score(LEGAL_SENTENCE);
    // 5 matches in 15 words
    expect(scores.legal).toBeCloseTo((5 / 15) * 1000);
    expect(scores.technical).toBe(0);
    expect(scores.structured).toBe(0);
  });

  it('adds the filename bonus to a single family', () => {
    const scores = classifier.score('plain words only here', 'contract-spec.txt');
    expect(scores.legal).toBe(2);
    expect(scores.technical).toBe(0);
  });
});
