/**
 * CaseDocumentReader - Turn a downloaded case page into divisions
 *
 * Selectors match the class attribute exactly, so e.g. a
 * `feldinhalt tenor` block is a content element but never a plain one.
 */

import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import type { CaseDocument, Division } from '../../services/parsing/types/CaseDocument.js';

const SELECTORS = {
  division: 'div[class="maindiv"]',
  label: 'div[class="feldbezeichnung"]',
  content: 'div[class="feldinhalt"], div[class="feldinhalt tenor"], div[class="feldinhalt leitsaetze"]',
  tenorContent: 'div[class="feldinhalt tenor"]',
  verdictParagraph: 'p[class="absatzLinks"]',
  verdictBlock: 'p[class="absatzLinks"], table[class="absatzLinks"]',
} as const;

export class CaseDocumentReader {
  /**
   * Parse an HTML string into a case document
   *
   * @param htmlContent - Page markup
   * @param sourcePath - Identifier carried into logs and errors
   */
  read(htmlContent: string, sourcePath: string): CaseDocument {
    const $ = cheerio.load(htmlContent);

    const divisions = $(SELECTORS.division)
      .toArray()
      .map((element, index) => this.readDivision($, element, index));

    return { sourcePath, divisions };
  }

  private readDivision($: cheerio.CheerioAPI, element: Element, index: number): Division {
    const div = $(element);
    const textOf = (_: number, el: Element): string => $(el).text();

    return {
      index,
      html: $.html(div),
      text: div.text(),
      labels: div.children(SELECTORS.label).map(textOf).get(),
      contents: div.children(SELECTORS.content).map(textOf).get(),
      hasTenorContent: div.children(SELECTORS.tenorContent).length > 0,
      paragraphs: div.find(SELECTORS.verdictParagraph).map(textOf).get(),
      hasVerdictBlocks: div.find(SELECTORS.verdictBlock).length > 0,
    };
  }
}
