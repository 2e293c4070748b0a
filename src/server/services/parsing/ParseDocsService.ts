/**
 * ParseDocsService - Parse every downloaded case page into JSON Lines
 *
 * Output is rewritten from scratch on each run. A document that breaks a
 * parsing invariant, or cannot be read, is logged and skipped; the rest of
 * the batch still runs and nothing partial is written for it.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import { logger as defaultLogger, type ParserLogger } from '../../utils/logger.js';
import { isDocumentParseError } from '../../types/errors.js';
import { CaseDocumentReader } from '../../extraction/html/CaseDocumentReader.js';
import { DocumentAssembler, toJsonLine } from './DocumentAssembler.js';
import type { CaseRecord } from './types/CaseRecord.js';

export interface ParseProgress {
  processed: number;
  total: number;
  file: string;
}

export interface ParseDirectoryOptions {
  /** Directory searched recursively for `*.html` */
  docsDir: string;
  /** JSON Lines file to (re)create */
  outputPath: string;
  /** Base for document identifiers; defaults to `docsDir` */
  relativeTo?: string;
  onProgress?: (progress: ParseProgress) => void;
}

export interface ParseSummary {
  total: number;
  written: number;
  failed: number;
}

export interface ParseDocsServiceOptions {
  reader?: CaseDocumentReader;
  assembler?: DocumentAssembler;
  logger?: ParserLogger;
}

export class ParseDocsService {
  private readonly reader: CaseDocumentReader;
  private readonly assembler: DocumentAssembler;
  private readonly logger: ParserLogger;

  constructor(options: ParseDocsServiceOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.reader = options.reader ?? new CaseDocumentReader();
    this.assembler = options.assembler ?? new DocumentAssembler({ logger: this.logger });
  }

  /**
   * Read and assemble one HTML file
   */
  async parseFile(filePath: string, sourcePath: string): Promise<CaseRecord> {
    const html = await fs.readFile(filePath, 'utf-8');
    return this.assembler.assemble(this.reader.read(html, sourcePath));
  }

  async parseDirectory(options: ParseDirectoryOptions): Promise<ParseSummary> {
    const { docsDir, outputPath, onProgress } = options;
    const relativeTo = options.relativeTo ?? docsDir;

    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, '', 'utf-8');

    const files = (await glob('**/*.html', { cwd: docsDir, absolute: true, nodir: true })).sort();

    this.logger.info({ docsDir, outputPath, total: files.length }, 'Parsing documents');

    const summary: ParseSummary = { total: files.length, written: 0, failed: 0 };

    for (const [i, file] of files.entries()) {
      const sourcePath = path.relative(relativeTo, file).split(path.sep).join('/');

      try {
        const record = await this.parseFile(file, sourcePath);
        await fs.appendFile(outputPath, toJsonLine(record) + '\n', 'utf-8');
        summary.written++;
      } catch (error) {
        summary.failed++;
        if (isDocumentParseError(error)) {
          this.logger.error(
            { sourcePath, code: error.code, context: error.context },
            `Skipping document: ${error.message}`
          );
        } else {
          this.logger.error(
            { sourcePath, error: error instanceof Error ? error.message : String(error) },
            'Failed to read or write document'
          );
        }
      }

      onProgress?.({ processed: i + 1, total: files.length, file: sourcePath });
    }

    this.logger.info({ ...summary, outputPath }, 'Parsing completed');
    return summary;
  }
}
