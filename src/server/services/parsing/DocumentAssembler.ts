/**
 * DocumentAssembler - Build one flat record from a case document
 *
 * Workflow:
 * 1. Classify every division
 * 2. Extract fields (metadata, principles, summary) or the verdict
 * 3. Merge the sections in a fixed order, refusing overlapping keys
 * 4. Attach the verdict markup under its reserved key
 */

import { logger as defaultLogger, type ParserLogger } from '../../utils/logger.js';
import { DuplicateKeyError, DuplicateSectionError } from '../../types/errors.js';
import { DivisionClassifier } from './classifiers/DivisionClassifier.js';
import { extractFields } from './extractors/FieldExtractor.js';
import { extractVerdict, flattenVerdict } from './extractors/VerdictExtractor.js';
import { DivisionCategory, type CaseDocument, type Division } from './types/CaseDocument.js';
import { VERDICT_HTML_KEY, type CaseRecord, type CaseRecordLine } from './types/CaseRecord.js';
import type { VerdictResult } from './types/VerdictResult.js';

/**
 * Sections collected from one document, at most one per category
 */
export interface DocumentSections {
  meta?: Record<string, string>;
  leitsaetze?: Record<string, string>;
  tenor?: Record<string, string>;
  verdict?: VerdictResult;
  verdictHtml?: string;
}

export interface DocumentAssemblerOptions {
  classifier?: DivisionClassifier;
  logger?: ParserLogger;
}

/**
 * Merge `incoming` into `target`, refusing any shared key
 *
 * @throws DuplicateKeyError listing the shared keys
 */
export function mergeDisjoint(
  target: Record<string, string>,
  incoming: Record<string, string>,
  section: string,
  sourcePath: string
): Record<string, string> {
  const overlap = Object.keys(incoming).filter(key => Object.prototype.hasOwnProperty.call(target, key));
  if (overlap.length > 0) {
    throw new DuplicateKeyError(section, overlap, sourcePath);
  }
  return Object.assign(target, incoming);
}

export class DocumentAssembler {
  private readonly classifier: DivisionClassifier;
  private readonly logger: ParserLogger;

  constructor(options: DocumentAssemblerOptions = {}) {
    this.classifier = options.classifier ?? new DivisionClassifier();
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Collect the sections of a document without merging them
   *
   * @throws DuplicateSectionError when a category occurs twice
   * @throws FieldCountMismatchError from field extraction
   */
  collectSections(document: CaseDocument): DocumentSections {
    const sections: DocumentSections = {};

    for (const division of document.divisions) {
      const outcome = this.classifier.classify(division);

      switch (outcome.kind) {
        case 'empty':
          continue;
        case 'ambiguous':
          this.logger.error(
            { sourcePath: document.sourcePath, division: division.index, categories: outcome.categories },
            `Multiple div types identified in ${document.sourcePath}.`
          );
          continue;
        case 'unknown':
          this.logger.error(
            { sourcePath: document.sourcePath, division: division.index },
            `Unknown division found in ${document.sourcePath}.`
          );
          continue;
        case 'classified':
          this.addSection(sections, outcome.category, division, document.sourcePath);
      }
    }

    return sections;
  }

  private addSection(
    sections: DocumentSections,
    category: DivisionCategory,
    division: Division,
    sourcePath: string
  ): void {
    if (sections[category] !== undefined) {
      throw new DuplicateSectionError(category, sourcePath);
    }

    switch (category) {
      case DivisionCategory.METADATA:
      case DivisionCategory.PRINCIPLES:
      case DivisionCategory.SUMMARY:
        sections[category] = extractFields(division, sourcePath);
        break;
      case DivisionCategory.VERDICT:
        sections.verdict = extractVerdict(division);
        sections.verdictHtml = division.html;
        break;
    }
  }

  /**
   * Assemble the record of one document
   */
  assemble(document: CaseDocument): CaseRecord {
    const sections = this.collectSections(document);
    const { sourcePath } = document;

    const fields: Record<string, string> = { ...sections.meta };
    mergeDisjoint(fields, sections.leitsaetze ?? {}, DivisionCategory.PRINCIPLES, sourcePath);
    mergeDisjoint(fields, sections.tenor ?? {}, DivisionCategory.SUMMARY, sourcePath);
    mergeDisjoint(
      fields,
      sections.verdict ? flattenVerdict(sections.verdict) : {},
      DivisionCategory.VERDICT,
      sourcePath
    );

    this.logger.debug(
      {
        sourcePath,
        fieldCount: Object.keys(fields).length,
        verdictFormat: sections.verdict?.format,
      },
      '[DocumentAssembler] Assembled record'
    );

    return { sourcePath, fields, verdictHtml: sections.verdictHtml };
  }
}

/**
 * Serialize a record as one JSON Lines entry (without the trailing newline)
 */
export function toJsonLine(record: CaseRecord): string {
  const line: CaseRecordLine = { ...record.fields, [VERDICT_HTML_KEY]: record.verdictHtml ?? '' };
  return JSON.stringify(line);
}
