/**
 * Tests for Phonetic Encoders
 */

import { soundex, doubleMetaphone } from '../../src/matching/phonetic';

describe('soundex', () => {
  it('should encode common names', () => {
    expect(soundex('Robert')).toBe('R163');
    expect(soundex('Tymczak')).toBe('T522');
  });

  it('should skip H and W between letters with the same code', () => {
    expect(soundex('Ashcraft')).toBe('A261');
  });

  it('should pad short codes with zeros', () => {
    expect(soundex('Sarah')).toBe('S600');
    expect(soundex('Lee')).toBe('L000');
  });

  it('should ignore case', () => {
    expect(soundex('robert')).toBe(soundex('ROBERT'));
  });

  it('should give the same code to close spellings', () => {
    expect(soundex('Sara')).toBe(soundex('Sarah'));
    expect(soundex('Smith')).toBe(soundex('Smyth'));
  });
});

describe('doubleMetaphone', () => {
  it('should return primary and alternate codes', () => {
    expect(doubleMetaphone('Sarah')).toEqual({ primary: 'SRH', alternate: 'SR' });
    expect(doubleMetaphone('Yusuf')).toEqual({ primary: 'YSF', alternate: 'ASF' });
  });

  it('should use the same code for both when there is no alternate', () => {
    expect(doubleMetaphone('Chloe')).toEqual({ primary: 'KL', alternate: 'KL' });
    expect(doubleMetaphone('Anna')).toEqual({ primary: 'AN', alternate: 'AN' });
  });

  it('should encode soft C and hard G', () => {
    expect(doubleMetaphone('Cecil').primary).toBe('SSL');
    expect(doubleMetaphone('Miguel').primary).toBe('MKL');
  });

  it('should encode a medial H both ways', () => {
    expect(doubleMetaphone('Mihel')).toEqual({ primary: 'MHL', alternate: 'ML' });
  });

  it('should encode initial X and W', () => {
    expect(doubleMetaphone('Xavier').primary).toBe('KSFR');
    expect(doubleMetaphone('Howard').primary).toBe('HWRT');
  });

  it('should return empty codes for empty input', () => {
    expect(doubleMetaphone('')).toEqual({ primary: '', alternate: '' });
  });
});
