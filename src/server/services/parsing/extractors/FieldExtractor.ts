/**
 * FieldExtractor - Read label/value pairs from a metadata, principles or
 * summary block
 */

import { FieldCountMismatchError } from '../../../types/errors.js';
import { collapseWhitespace, normalizeLabel } from '../normalizers/TextNormalizer.js';
import type { Division } from '../types/CaseDocument.js';

/**
 * Pair labels with contents by position.
 *
 * Keys are normalized labels, values keep their case. When two labels
 * normalize to the same key the later pair wins.
 *
 * @throws FieldCountMismatchError if the label and content counts differ
 */
export function extractFields(
  division: Pick<Division, 'labels' | 'contents'>,
  sourcePath: string
): Record<string, string> {
  const { labels, contents } = division;
  if (labels.length !== contents.length) {
    throw new FieldCountMismatchError(labels.length, contents.length, sourcePath);
  }

  return Object.fromEntries(
    labels.map((label, i): [string, string] => [normalizeLabel(label), collapseWhitespace(contents[i])])
  );
}
