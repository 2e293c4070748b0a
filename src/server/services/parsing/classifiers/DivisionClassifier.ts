/**
 * DivisionClassifier - Decide what a `maindiv` block of a case document holds
 *
 * Every rule is evaluated independently so that blocks matching more than
 * one category are reported as ambiguous instead of being assigned to the
 * first hit.
 */

import { labelKeyword } from '../normalizers/TextNormalizer.js';
import { DivisionCategory, type Division } from '../types/CaseDocument.js';

export const METADATA_LABELS: ReadonlySet<string> = new Set([
  'Datum',
  'Gericht',
  'Spruchkörper',
  'Entscheidungsart',
  'Aktenzeichen',
  'ECLI',
]);

export const PRINCIPLES_LABELS: ReadonlySet<string> = new Set([
  'Vorinstanz',
  'Nachinstanz',
  'Schlagworte',
  'Normen',
  'Leitsätze',
  'Rechtskraft',
  'Sachgebiet',
]);

export const SUMMARY_LABEL = 'Tenor';

export interface ClassificationRule {
  category: DivisionCategory;
  matches: (division: Division) => boolean;
}

export type ClassificationOutcome =
  | { kind: 'empty' }
  | { kind: 'classified'; category: DivisionCategory }
  | { kind: 'ambiguous'; categories: DivisionCategory[] }
  | { kind: 'unknown' };

function hasLabelIn(division: Division, accepted: ReadonlySet<string>): boolean {
  return division.labels.some(label => accepted.has(labelKeyword(label)));
}

/**
 * Rules in evaluation order; the order also fixes the order of categories
 * reported for ambiguous blocks.
 */
export const DEFAULT_RULES: readonly ClassificationRule[] = [
  {
    category: DivisionCategory.METADATA,
    matches: division => hasLabelIn(division, METADATA_LABELS),
  },
  {
    category: DivisionCategory.PRINCIPLES,
    matches: division => hasLabelIn(division, PRINCIPLES_LABELS),
  },
  {
    category: DivisionCategory.SUMMARY,
    matches: division =>
      division.hasTenorContent ||
      division.labels.some(label => labelKeyword(label) === SUMMARY_LABEL),
  },
  {
    category: DivisionCategory.VERDICT,
    matches: division => division.hasVerdictBlocks,
  },
];

export class DivisionClassifier {
  private readonly rules: readonly ClassificationRule[];

  constructor(rules: readonly ClassificationRule[] = DEFAULT_RULES) {
    this.rules = rules;
  }

  /**
   * Every category whose rule accepts the division, in rule order
   */
  matchCategories(division: Division): DivisionCategory[] {
    return this.rules.filter(rule => rule.matches(division)).map(rule => rule.category);
  }

  classify(division: Division): ClassificationOutcome {
    if (division.text.trim().length === 0) {
      return { kind: 'empty' };
    }

    const categories = this.matchCategories(division);
    if (categories.length > 1) {
      return { kind: 'ambiguous', categories };
    }
    if (categories.length === 0) {
      return { kind: 'unknown' };
    }
    return { kind: 'classified', category: categories[0] };
  }
}
