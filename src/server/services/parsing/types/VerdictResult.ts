/**
 * Recognized verdict text layouts
 */
export enum VerdictFormat {
  /** "Tatbestand" followed by "Entscheidungsgründe" */
  FORMAT_1 = 'format_1',
  /** "Gründe" with roman-numeral parts I. and II. */
  FORMAT_2 = 'format_2',
  INVALID = 'invalid',
}

export interface Format1Verdict {
  format: VerdictFormat.FORMAT_1;
  tatbestand: string;
  'entscheidungsgründe': string;
}

export interface Format2Verdict {
  format: VerdictFormat.FORMAT_2;
  bezugnahme: string;
  begruendung: string;
}

export interface InvalidVerdict {
  format: VerdictFormat.INVALID;
}

export type VerdictResult = Format1Verdict | Format2Verdict | InvalidVerdict;
