import { describe, it, expect } from 'vitest';
import {
  extractTitleFromText,
  extractYear,
  isUsableTitle,
  paperIdFromFilename,
} from '../../src/services/ingestion/paperMetadata.js';

describe('isUsableTitle', () => {
  it('accepts a descriptive title', () => {
    expect(isUsableTitle('Ecological Restoration of Streams')).toBe(true);
  });

  it('rejects short, layout, boilerplate and numeric-prefixed titles', () => {
    expect(isUsableTitle(undefined)).toBe(false);
    expect(isUsableTitle('Short title')).toBe(false);
    expect(isUsableTitle('Journal_layout_final.indd')).toBe(false);
    expect(isUsableTitle('Artículos Formados para revista')).toBe(false);
    expect(isUsableTitle('0123 Annual Report on Water Quality')).toBe(false);
  });
});

describe('extractTitleFromText', () => {
  it('picks the first long line with enough words', () => {
    const text = 'JOURNAL\n\nVol 3\nEcological restoration of streams and rivers in the basin\nAbstract';

    expect(extractTitleFromText(text)).toBe('Ecological restoration of streams and rivers in the basin');
  });

  it('requires more than five spaces', () => {
    expect(extractTitleFromText('Considerably lengthy heading having five gaps')).toBe('');
  });

  it('only scans the first thirty non-empty lines', () => {
    const text = [...Array.from({ length: 30 }, () => 'x'), 'Ecological restoration of streams and rivers in the basin'].join(
      '\n\n'
    );

    expect(extractTitleFromText(text)).toBe('');
  });
});

describe('extractYear', () => {
  it('finds a standalone 19xx or 20xx year', () => {
    expect(extractYear('report-2019-v2.pdf')).toBe('2019');
    expect(extractYear('survey-1998.pdf')).toBe('1998');
  });

  it('ignores digits inside longer numbers or words', () => {
    expect(extractYear('annurev-ecolsys-120213-091935.pdf')).toBeUndefined();
    expect(extractYear('study_2019.pdf')).toBeUndefined();
    expect(extractYear('v17s1a3.pdf')).toBeUndefined();
  });
});

describe('paperIdFromFilename', () => {
  it('prefixes the file stem', () => {
    expect(paperIdFromFilename('papers/v17s1a3.pdf')).toBe('paper_v17s1a3');
    expect(paperIdFromFilename('notes')).toBe('paper_notes');
  });
});
