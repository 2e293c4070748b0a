/**
 * Whitespace and label normalization shared by the extractors.
 */

const WHITESPACE_RUN = /\s+/;
const TRAILING_COLONS_AND_SPACE = /[\s:]+$/;

/**
 * Collapse every whitespace run (newlines included) to a single space and trim.
 */
export function collapseWhitespace(text: string): string {
  return text.split(WHITESPACE_RUN).filter(part => part.length > 0).join(' ');
}

/**
 * Normalize each paragraph, drop the empty ones and join the rest with a
 * blank line, keeping document order.
 */
export function joinParagraphs(paragraphs: string[]): string {
  return paragraphs
    .map(collapseWhitespace)
    .filter(paragraph => paragraph.length > 0)
    .join('\n\n');
}

/**
 * Field-name form used as record key: collapsed, lowercase, no trailing colon.
 * Idempotent.
 */
export function normalizeLabel(label: string): string {
  return collapseWhitespace(label).toLowerCase().replace(TRAILING_COLONS_AND_SPACE, '');
}

/**
 * Label form used for classification: trimmed, trailing colons removed,
 * case kept.
 */
export function labelKeyword(label: string): string {
  return label.trim().replace(/:+$/, '');
}
