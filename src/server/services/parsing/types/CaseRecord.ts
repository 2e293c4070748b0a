/**
 * Key under which the serialized verdict markup is written
 */
export const VERDICT_HTML_KEY = 'verdict_html';

/**
 * Flat output record for one case document
 */
export interface CaseRecord {
  /** Document identifier (path relative to the documents directory) */
  sourcePath: string;
  /** Metadata, principles, summary and verdict fields, merged without overlap */
  fields: Record<string, string>;
  /** Outer markup of the verdict division, when the document has one */
  verdictHtml?: string;
}

/**
 * Shape of one JSON Lines entry
 */
export type CaseRecordLine = Record<string, string>;
