/**
 * VerdictExtractor - Split verdict text into its labeled sections
 *
 * Two layouts are recognized, tried in order against the whole text:
 * 1. "Tatbestand" ... "Entscheidungsgründe" ...
 * 2. "Gründe" / "I." ... / "II." ... (up to an optional "III.")
 *
 * Section headers may be letter-spaced ("T a t b e s t a n d") and may end
 * with a colon. Matching is case-insensitive and sections span newlines.
 */

import { joinParagraphs } from '../normalizers/TextNormalizer.js';
import { VerdictFormat, type VerdictResult } from '../types/VerdictResult.js';
import type { Division } from '../types/CaseDocument.js';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Regex source for a header keyword that tolerates whitespace between letters
 */
export function spacedKeyword(keyword: string): string {
  return Array.from(keyword).map(escapeRegExp).join('\\s*');
}

const TATBESTAND = spacedKeyword('Tatbestand');
const ENTSCHEIDUNGSGRUENDE = spacedKeyword('Entscheidungsgründe');
const GRUENDE = spacedKeyword('Gründe');

// No `m` flag: `^` and `$` refer to the whole text only
const FORMAT_1_PATTERN = new RegExp(
  `^\\s*${TATBESTAND}\\s*:?\\s*\\n(.*?)\\n` +
    `\\s*${ENTSCHEIDUNGSGRUENDE}\\s*:?\\s*\\n(.*?)$`,
  'isu'
);

const FORMAT_2_PATTERN = new RegExp(
  `^\\s*${GRUENDE}\\s*:?\\s*\\n` +
    `\\s*I\\s*\\.\\s*\\n(.*?)\\n` +
    `\\s*II\\s*\\.\\s*\\n(.*?)` +
    `(?:\\n\\s*III\\s*\\.\\s*\\n|$)`,
  'isu'
);

/**
 * Classify normalized verdict text and pull out its two sections
 */
export function matchVerdictText(text: string): VerdictResult {
  const format1 = FORMAT_1_PATTERN.exec(text);
  if (format1) {
    return {
      format: VerdictFormat.FORMAT_1,
      tatbestand: format1[1],
      'entscheidungsgründe': format1[2],
    };
  }

  const format2 = FORMAT_2_PATTERN.exec(text);
  if (format2) {
    return {
      format: VerdictFormat.FORMAT_2,
      bezugnahme: format2[1],
      begruendung: format2[2],
    };
  }

  return { format: VerdictFormat.INVALID };
}

/**
 * Extract the verdict of a division classified as VERDICT
 */
export function extractVerdict(division: Pick<Division, 'paragraphs'>): VerdictResult {
  return matchVerdictText(joinParagraphs(division.paragraphs));
}

/**
 * Flatten a verdict into record fields: the format tag plus the populated sections
 */
export function flattenVerdict(verdict: VerdictResult): Record<string, string> {
  return { ...verdict };
}
