/**
 * Parsing Layer
 * 
 * Central export point for the parsing layer.
 * 
 * This layer turns downloaded case pages into flat records:
 * - Division classification
 * - Field extraction (metadata, principles, summary)
 * - Verdict text extraction
 * - Record assembly and JSON Lines output
 */

// Main orchestrators
export { DocumentAssembler, mergeDisjoint, toJsonLine } from './DocumentAssembler.js';
export type { DocumentSections, DocumentAssemblerOptions } from './DocumentAssembler.js';
export { ParseDocsService } from './ParseDocsService.js';
export type { ParseDirectoryOptions, ParseProgress, ParseSummary } from './ParseDocsService.js';

// Reader
export { CaseDocumentReader } from '../../extraction/html/CaseDocumentReader.js';

// Classification
export { DivisionClassifier, DEFAULT_RULES } from './classifiers/DivisionClassifier.js';
export type { ClassificationOutcome, ClassificationRule } from './classifiers/DivisionClassifier.js';

// Extractors
export { extractFields } from './extractors/FieldExtractor.js';
export { extractVerdict, flattenVerdict, matchVerdictText } from './extractors/VerdictExtractor.js';
export { collapseWhitespace, joinParagraphs, normalizeLabel } from './normalizers/TextNormalizer.js';

// Types
export { DivisionCategory } from './types/CaseDocument.js';
export type { CaseDocument, Division } from './types/CaseDocument.js';
export { VerdictFormat } from './types/VerdictResult.js';
export type { VerdictResult, Format1Verdict, Format2Verdict, InvalidVerdict } from './types/VerdictResult.js';
export { VERDICT_HTML_KEY } from './types/CaseRecord.js';
export type { CaseRecord, CaseRecordLine } from './types/CaseRecord.js';
