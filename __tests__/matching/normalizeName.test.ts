/**
 * Tests for Name Normalization
 */

import {
  normalizeName,
  splitNameParts,
  parseName,
  isHonorific,
  stripTitles,
} from '../../src/matching/normalizeName';

describe('normalizeName', () => {
  describe('separator folding', () => {
    it('should replace hyphens with spaces', () => {
      expect(normalizeName('Ali Al-Mansour')).toBe('Ali Al Mansour');
    });

    it('should replace underscores, periods and commas with spaces', () => {
      expect(normalizeName('Jin_ho')).toBe('Jin ho');
      expect(normalizeName('Dr. Ayesha Khan')).toBe('Dr Ayesha Khan');
      expect(normalizeName('Smith,John')).toBe('Smith John');
    });

    it('should collapse runs of whitespace', () => {
      expect(normalizeName('Jane    Doe')).toBe('Jane Doe');
      expect(normalizeName('J. P. Smith')).toBe('J P Smith');
    });

    it('should trim whitespace', () => {
      expect(normalizeName('  Jane Doe  ')).toBe('Jane Doe');
    });

    it('should keep casing', () => {
      expect(normalizeName('McDONALD')).toBe('McDONALD');
    });
  });

  describe('edge cases', () => {
    it('should return empty string for empty input', () => {
      expect(normalizeName('')).toBe('');
    });

    it('should return empty string for separators only', () => {
      expect(normalizeName(' - _ . , ')).toBe('');
    });

    it('should be idempotent', () => {
      const inputs = ['Dr. Ayesha Khan', ' Jin-ho  Kim ', 'a_b.c,d-e', ''];

      for (const input of inputs) {
        const once = normalizeName(input);
        expect(normalizeName(once)).toBe(once);
      }
    });
  });
});

describe('splitNameParts', () => {
  it('should lowercase and split on spaces', () => {
    expect(splitNameParts('Ali Al Mansour')).toEqual(['ali', 'al', 'mansour']);
  });

  it('should return no parts for empty text', () => {
    expect(splitNameParts('')).toEqual([]);
  });
});

describe('parseName', () => {
  it('should derive every comparison form', () => {
    expect(parseName('Dr. Ayesha Khan')).toEqual({
      raw: 'Dr. Ayesha Khan',
      normalized: 'Dr Ayesha Khan',
      key: 'dr ayesha khan',
      parts: ['dr', 'ayesha', 'khan'],
    });
  });

  it('should keep the raw text verbatim', () => {
    expect(parseName('Jin-ho Kim').raw).toBe('Jin-ho Kim');
    expect(parseName('Jin-ho Kim').key).toBe('jin ho kim');
  });
});

describe('honorifics', () => {
  it('should recognise titles regardless of case and trailing period', () => {
    expect(isHonorific('Dr')).toBe(true);
    expect(isHonorific('dr.')).toBe(true);
    expect(isHonorific('PROF')).toBe(true);
    expect(isHonorific('Dame')).toBe(true);
  });

  it('should not treat names as titles', () => {
    expect(isHonorific('Drake')).toBe(false);
    expect(isHonorific('Sara')).toBe(false);
  });

  it('should strip titles from name parts', () => {
    expect(stripTitles(['Dr.', 'Sarah', 'Taylor'])).toEqual(['Sarah', 'Taylor']);
    expect(stripTitles(['mrs', 'ms'])).toEqual([]);
  });
});
