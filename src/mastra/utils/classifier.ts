import type { DocumentType } from './types.js';

// Legal vocabulary: section references, instruments, obligations, connectives
const LEGAL_PATTERNS: readonly RegExp[] = [
  /\b(?:article|section|clause|chapter|paragraph|subsection)\s+\d+/gi,
  /\b(?:law|act|code|regulation|decree|ordinance|statute)s?\b/gi,
  /\b(?:agreement|contract|covenant|protocol)s?\b/gi,
  /\b(?:obligations?|liabilit(?:y|ies)|requirements?|indemnif\w*)\b/gi,
  /\b(?:pursuant to|in accordance with|hereinafter|notwithstanding|whereas)\b/gi,
];

const TECHNICAL_PATTERNS: readonly RegExp[] = [
  /\b(?:technical requirements?|specifications?|standards?)\b/gi,
  /\b(?:parameters?|characteristics|configuration|metrics)\b/gi,
  /\b(?:methodology|procedure|algorithm|implementation)s?\b/gi,
  /\b(?:system|device|equipment|api|server|database)s?\b/gi,
  /\b(?:ISO|IEC|IEEE|RFC)\s*\d+/gi,
];

// Line-start markers: numbered, lettered, bullet, heading, table row
const STRUCTURED_PATTERNS: readonly RegExp[] = [
  /^[ \t]*\d+\.\s+/gm,
  /^[ \t]*[a-z]\)\s+/gm,
  /^[ \t]*[-•*]\s+/gm,
  /^[ \t]*#{1,6}\s+/gm,
  /^[ \t]*\|.*\|/gm,
];

const LEGAL_FILENAME_HINTS = ['law', 'contract', 'agreement', 'regulation', 'statute'];
const TECHNICAL_FILENAME_HINTS = ['tech', 'spec', 'standard', 'manual', 'api'];

const FILENAME_BONUS = 2.0;
const MIXED_THRESHOLD = 1.0;
const DOMINANT_THRESHOLD = 0.5;
const NARRATIVE_PARAGRAPH_WORDS = 50;
const NARRATIVE_MAX_STRUCTURE = 0.1;

export interface ClassificationScores {
  legal: number;
  technical: number;
  structured: number;
}

function countMatches(content: string, patterns: readonly RegExp[]): number {
  return patterns.reduce((total, pattern) => total + (content.match(pattern)?.length ?? 0), 0);
}

function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * Rule-based document style classifier.
 *
 * Pattern match counts are normalized to matches per thousand words; a filename hint
 * adds a fixed bonus to the legal or technical score. Pure and total: unrecognized
 * input classifies as `unknown`.
 */
export class DocumentClassifier {
  /**
   * Per-family density scores, filename bonus included
   */
  score(content: string, filename?: string): ClassificationScores {
    const wordCount = countWords(content);
    const density = (matches: number) => (wordCount > 0 ? (matches / wordCount) * 1000 : matches);

    const scores: ClassificationScores = {
      legal: density(countMatches(content, LEGAL_PATTERNS)),
      technical: density(countMatches(content, TECHNICAL_PATTERNS)),
      structured: density(countMatches(content, STRUCTURED_PATTERNS)),
    };

    if (filename) {
      const name = filename.toLowerCase();
      if (LEGAL_FILENAME_HINTS.some((hint) => name.includes(hint))) {
        scores.legal += FILENAME_BONUS;
      } else if (TECHNICAL_FILENAME_HINTS.some((hint) => name.includes(hint))) {
        scores.technical += FILENAME_BONUS;
      }
    }

    return scores;
  }

  classify(content: string, filename?: string): DocumentType {
    const scores = this.score(content, filename);
    const ranked: Array<[DocumentType, number]> = [
      ['legal', scores.legal],
      ['technical', scores.technical],
      ['structured', scores.structured],
    ];

    if (ranked.filter(([, value]) => value > MIXED_THRESHOLD).length > 1) {
      return 'mixed';
    }

    let best = ranked[0];
    for (const candidate of ranked.slice(1)) {
      if (candidate[1] > best[1]) {
        best = candidate;
      }
    }
    if (best[1] > DOMINANT_THRESHOLD) {
      return best[0];
    }

    const paragraphs = content.split('\n\n');
    const avgParagraphWords =
      paragraphs.reduce((total, paragraph) => total + countWords(paragraph), 0) / paragraphs.length;

    if (avgParagraphWords > NARRATIVE_PARAGRAPH_WORDS && scores.structured < NARRATIVE_MAX_STRUCTURE) {
      return 'narrative';
    }

    return 'unknown';
  }
}
