/**
 * Tests for Regional Name Heuristics
 */

import {
  hasYiSubstitutionPattern,
  isTransliterationEquivalent,
  isHispanicName,
  hispanicNameSimilarity,
  isLikelyArabicName,
  arabicNameSimilarity,
  detectNameFamily,
} from '../../src/matching/regionalHeuristics';

describe('hasYiSubstitutionPattern', () => {
  it('should detect Y against I with the same consonants', () => {
    expect(hasYiSubstitutionPattern('sayra', 'saira')).toBe(true);
    expect(hasYiSubstitutionPattern('kyle', 'kile')).toBe(true);
  });

  it('should be false without a Y/I swap', () => {
    expect(hasYiSubstitutionPattern('sara', 'saira')).toBe(false);
    expect(hasYiSubstitutionPattern('sayra', 'sayra')).toBe(false);
  });
});

describe('isTransliterationEquivalent', () => {
  it('should accept a Y/I swap in either order, ignoring case', () => {
    expect(isTransliterationEquivalent('Sayra', 'Saira')).toBe(true);
    expect(isTransliterationEquivalent('Saira', 'Sayra')).toBe(true);
  });

  it('should reject other spellings', () => {
    expect(isTransliterationEquivalent('sara', 'saira')).toBe(false);
  });
});

describe('isHispanicName', () => {
  it('should detect Hispanic openings, clusters and endings', () => {
    expect(isHispanicName('Fernandez')).toBe(true);
    expect(isHispanicName('Miguel')).toBe(true);
    expect(isHispanicName('Carlos')).toBe(true);
    expect(isHispanicName('Guillermo')).toBe(true);
  });

  it('should reject other names', () => {
    expect(isHispanicName('Smith')).toBe(false);
  });

  it('should reject names shorter than three characters', () => {
    expect(isHispanicName('ra')).toBe(false);
  });
});

describe('hispanicNameSimilarity', () => {
  it('should score a close G/H interchange at 0.9', () => {
    expect(hispanicNameSimilarity('Miguel', 'Mihel')).toBe(0.9);
    expect(hispanicNameSimilarity('miguel cruz', 'mihel cruz')).toBe(0.9);
  });

  it('should score a distant G/H interchange at 0.7', () => {
    expect(hispanicNameSimilarity('Migueles', 'Mihx')).toBe(0.7);
  });

  it('should return 0 when the pattern does not apply', () => {
    expect(hispanicNameSimilarity('Maria', 'Mihel')).toBe(0);
    expect(hispanicNameSimilarity('john smith', 'john smith')).toBe(0);
  });
});

describe('isLikelyArabicName', () => {
  it('should detect articles and patronymic openings', () => {
    expect(isLikelyArabicName('Ali Al-Mansour')).toBe(true);
    expect(isLikelyArabicName('ibn Battuta')).toBe(true);
  });

  it('should need the hyphen after the article', () => {
    expect(isLikelyArabicName('Ali Mansour')).toBe(false);
  });

  it('should only accept bin at the start', () => {
    expect(isLikelyArabicName('Omar bin Khalid')).toBe(false);
  });

  it('should reject other names', () => {
    expect(isLikelyArabicName('Robin Hood')).toBe(false);
  });
});

describe('arabicNameSimilarity', () => {
  it('should score a doubled vowel against vowel + H at 0.85', () => {
    expect(arabicNameSimilarity('saara', 'sarah')).toBe(0.85);
  });

  it('should score a grouped vowel drift at 0.9', () => {
    expect(arabicNameSimilarity('ahmad', 'ahmed')).toBe(0.9);
  });

  it('should penalize an H on one side with different vowel counts', () => {
    expect(arabicNameSimilarity('sarah', 'saira')).toBe(0.1);
  });

  it('should return 0 when lengths differ by more than three', () => {
    expect(arabicNameSimilarity('ali', 'abdulrahman')).toBe(0);
  });
});

describe('detectNameFamily', () => {
  it('should pick hispanic when both names look Hispanic', () => {
    expect(detectNameFamily('miguel cruz', 'mihel cruz', 'Miguel Cruz', 'Mihel Cruz')).toBe('hispanic');
  });

  it('should pick arabic from the raw text of both names', () => {
    expect(
      detectNameFamily('ali al mansour', 'ali al mansoor', 'Ali Al-Mansour', 'Ali Al-Mansoor')
    ).toBe('arabic');
  });

  it('should fall back to generic', () => {
    expect(detectNameFamily('wei zhang', 'anna berg', 'Wei Zhang', 'Anna Berg')).toBe('generic');
    expect(detectNameFamily('ali al mansour', 'wei zhang', 'Ali Al-Mansour', 'Wei Zhang')).toBe('generic');
  });
});
