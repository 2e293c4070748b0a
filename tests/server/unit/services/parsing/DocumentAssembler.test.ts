import { describe, it, expect } from 'vitest';
import {
  DocumentAssembler,
  mergeDisjoint,
  toJsonLine,
} from '../../../../../src/server/services/parsing/DocumentAssembler.js';
import type { CaseDocument } from '../../../../../src/server/services/parsing/types/CaseDocument.js';
import {
  DuplicateKeyError,
  DuplicateSectionError,
  FieldCountMismatchError,
  isDocumentParseError,
} from '../../../../../src/server/types/errors.js';
import { createTestLogger, makeDivision, metaDivision } from '../../helpers/divisions.js';

const SOURCE = 'nrwe/olgs/koeln/2020/urteil.html';

function documentOf(...divisions: CaseDocument['divisions']): CaseDocument {
  return { sourcePath: SOURCE, divisions: divisions.map((division, index) => ({ ...division, index })) };
}

describe('mergeDisjoint', () => {
  it('returns the union of disjoint field sets', () => {
    const target = { gericht: 'OLG Köln' };
    expect(mergeDisjoint(target, { normen: 'BGB' }, 'leitsaetze', SOURCE)).toEqual({
      gericht: 'OLG Köln',
      normen: 'BGB',
    });
  });

  it('throws on shared keys and leaves the target untouched', () => {
    const target = { gericht: 'OLG Köln', datum: '12.03.2020' };
    expect(() => mergeDisjoint(target, { datum: '13.03.2020', tenor: 'x' }, 'tenor', SOURCE)).toThrow(
      DuplicateKeyError
    );
    expect(target).toEqual({ gericht: 'OLG Köln', datum: '12.03.2020' });
  });

  it('lists the colliding keys sorted', () => {
    try {
      mergeDisjoint({ b: '1', a: '2' }, { b: '3', a: '4', c: '5' }, 'verdict', SOURCE);
      expect.unreachable('mergeDisjoint should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(DuplicateKeyError);
      if (error instanceof DuplicateKeyError) {
        expect(error.keys).toEqual(['a', 'b']);
        expect(error.section).toBe('verdict');
      }
    }
  });
});

describe('DocumentAssembler', () => {
  it('merges metadata, principles, summary and verdict into one record', () => {
    const assembler = new DocumentAssembler({ logger: createTestLogger() });
    const record = assembler.assemble(
      documentOf(
        metaDivision(),
        makeDivision({ labels: ['Schlagworte:'], contents: ['Kaufvertrag'] }),
        makeDivision({ labels: ['Tenor:'], contents: ['Die Berufung wird zurückgewiesen.'], hasTenorContent: true }),
        makeDivision({
          html: '<div class="maindiv"><p class="absatzLinks">Tatbestand</p></div>',
          paragraphs: ['Tatbestand', 'A', 'Entscheidungsgründe', 'B'],
          hasVerdictBlocks: true,
        })
      )
    );

    expect(record).toEqual({
      sourcePath: SOURCE,
      fields: {
        gericht: 'OLG Köln',
        datum: '12.03.2020',
        schlagworte: 'Kaufvertrag',
        tenor: 'Die Berufung wird zurückgewiesen.',
        format: 'format_1',
        tatbestand: 'A',
        'entscheidungsgründe': 'B',
      },
      verdictHtml: '<div class="maindiv"><p class="absatzLinks">Tatbestand</p></div>',
    });
  });

  it('records an unmatched verdict text as invalid format', () => {
    const assembler = new DocumentAssembler({ logger: createTestLogger() });
    const record = assembler.assemble(
      documentOf(metaDivision(), makeDivision({ paragraphs: ['Random text'], hasVerdictBlocks: true }))
    );
    expect(record.fields).toEqual({ gericht: 'OLG Köln', datum: '12.03.2020', format: 'invalid' });
  });

  it('produces no verdict fields when the document has no verdict block', () => {
    const assembler = new DocumentAssembler({ logger: createTestLogger() });
    const record = assembler.assemble(documentOf(metaDivision()));
    expect(record.fields).toEqual({ gericht: 'OLG Köln', datum: '12.03.2020' });
    expect(record.verdictHtml).toBeUndefined();
  });

  it('throws DuplicateSectionError for a second metadata block', () => {
    const assembler = new DocumentAssembler({ logger: createTestLogger() });
    const document = documentOf(
      metaDivision(),
      makeDivision({ labels: ['Aktenzeichen:'], contents: ['7 U 1/20'] })
    );

    expect(() => assembler.assemble(document)).toThrow(DuplicateSectionError);
    expect(() => assembler.assemble(document)).toThrow(`Multiple meta divisions found in ${SOURCE}.`);
  });

  it('throws DuplicateSectionError for a second verdict block', () => {
    const assembler = new DocumentAssembler({ logger: createTestLogger() });
    const verdict = makeDivision({ paragraphs: ['Random text'], hasVerdictBlocks: true });
    expect(() => assembler.assemble(documentOf(verdict, verdict))).toThrow(DuplicateSectionError);
  });

  it('throws DuplicateKeyError when sections share a key', () => {
    const assembler = new DocumentAssembler({ logger: createTestLogger() });
    const document = documentOf(
      makeDivision({ labels: ['Gericht:', 'Hinweis:'], contents: ['OLG Köln', 'a'] }),
      makeDivision({ labels: ['Normen:', 'Hinweis:'], contents: ['BGB', 'b'] })
    );

    expect(() => assembler.assemble(document)).toThrow(DuplicateKeyError);
  });

  it('throws DuplicateKeyError when a field is named like a verdict key', () => {
    const assembler = new DocumentAssembler({ logger: createTestLogger() });
    const document = documentOf(
      makeDivision({ labels: ['Datum:', 'Format:'], contents: ['01.01.2020', 'PDF'] }),
      makeDivision({ paragraphs: ['Random text'], hasVerdictBlocks: true })
    );

    expect(() => assembler.assemble(document)).toThrow(DuplicateKeyError);
  });

  it('propagates field count mismatches', () => {
    const assembler = new DocumentAssembler({ logger: createTestLogger() });
    const document = documentOf(makeDivision({ labels: ['Datum:', 'Gericht:'], contents: ['01.01.2020'] }));

    expect(() => assembler.assemble(document)).toThrow(FieldCountMismatchError);
  });

  it('skips and logs ambiguous blocks without raising', () => {
    const logger = createTestLogger();
    const assembler = new DocumentAssembler({ logger });
    const record = assembler.assemble(
      documentOf(
        metaDivision(),
        makeDivision({ labels: ['Normen:', 'Tenor:'], contents: ['BGB', 'Abgewiesen'] })
      )
    );

    expect(record.fields).toEqual({ gericht: 'OLG Köln', datum: '12.03.2020' });
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      { sourcePath: SOURCE, division: 1, categories: ['leitsaetze', 'tenor'] },
      `Multiple div types identified in ${SOURCE}.`
    );
  });

  it('does not count a skipped ambiguous block as a section', () => {
    const assembler = new DocumentAssembler({ logger: createTestLogger() });
    const record = assembler.assemble(
      documentOf(
        makeDivision({ labels: ['Datum:', 'Normen:'], contents: ['01.01.2020', 'BGB'] }),
        metaDivision()
      )
    );
    expect(record.fields).toEqual({ gericht: 'OLG Köln', datum: '12.03.2020' });
  });

  it('skips and logs unknown blocks without raising', () => {
    const logger = createTestLogger();
    const assembler = new DocumentAssembler({ logger });
    const record = assembler.assemble(
      documentOf(metaDivision(), makeDivision({ labels: ['Hinweis:'], contents: ['x'] }))
    );

    expect(record.fields).toEqual({ gericht: 'OLG Köln', datum: '12.03.2020' });
    expect(logger.error).toHaveBeenCalledWith(
      { sourcePath: SOURCE, division: 1 },
      `Unknown division found in ${SOURCE}.`
    );
  });

  it('skips empty blocks silently', () => {
    const logger = createTestLogger();
    const assembler = new DocumentAssembler({ logger });
    assembler.assemble(documentOf(makeDivision({ text: '   ', labels: ['Hinweis:'] }), metaDivision()));
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('raises errors that the batch driver recognizes as per-document failures', () => {
    const assembler = new DocumentAssembler({ logger: createTestLogger() });
    try {
      assembler.assemble(documentOf(metaDivision(), metaDivision()));
      expect.unreachable('assemble should have thrown');
    } catch (error) {
      expect(isDocumentParseError(error)).toBe(true);
    }
  });
});

describe('toJsonLine', () => {
  it('appends verdict_html after the fields', () => {
    const line = toJsonLine({
      sourcePath: SOURCE,
      fields: { gericht: 'OLG Köln', format: 'invalid' },
      verdictHtml: '<div class="maindiv"></div>',
    });
    expect(line).toBe('{"gericht":"OLG Köln","format":"invalid","verdict_html":"<div class=\\"maindiv\\"></div>"}');
  });

  it('writes an empty verdict_html when there was no verdict block', () => {
    expect(toJsonLine({ sourcePath: SOURCE, fields: { datum: '01.01.2020' } })).toBe(
      '{"datum":"01.01.2020","verdict_html":""}'
    );
  });
});
