/**
 * Semantic category of a `maindiv` block in a case document
 */
export enum DivisionCategory {
  METADATA = 'meta',
  PRINCIPLES = 'leitsaetze',
  SUMMARY = 'tenor',
  VERDICT = 'verdict',
}

/**
 * One structural block (`div.maindiv`) of a case document, reduced to the
 * pieces classification and extraction look at. Text values are raw text
 * content; normalization happens downstream.
 */
export interface Division {
  /** Position among the document's divisions (0-based) */
  index: number;
  /** Outer markup of the block */
  html: string;
  /** Full text content of the block */
  text: string;
  /** `feldbezeichnung` children, in document order */
  labels: string[];
  /** `feldinhalt` children (plain, tenor and leitsaetze variants), in document order */
  contents: string[];
  /** True when a content child carries the `tenor` style */
  hasTenorContent: boolean;
  /** `p.absatzLinks` descendants */
  paragraphs: string[];
  /** True when any `p` or `table` descendant carries `absatzLinks` */
  hasVerdictBlocks: boolean;
}

/**
 * A parsed case file: its identifier and its divisions in order
 */
export interface CaseDocument {
  sourcePath: string;
  divisions: Division[];
}
