/**
 * Phonetic Encoders for the Name Matching Engine
 *
 * Two independent codes per word:
 * - Soundex: first letter plus three consonant-class digits
 * - A Double-Metaphone-like code with a primary and an alternate reading
 *
 * Both are pure functions of a single word and ignore case.
 */

import { PHONETIC_VOWELS, SOUNDEX_DIGITS } from './constants';
import type { MetaphoneCodes } from './types';

/**
 * Soundex digit for one uppercase character. Anything outside A-Z is '0'.
 */
function soundexDigit(char: string): string {
  const code = char.charCodeAt(0) - 65;
  return code >= 0 && code < 26 ? SOUNDEX_DIGITS.charAt(code) : '0';
}

/**
 * Classic Soundex.
 *
 * The first letter is kept, H and W are dropped from the rest, the remaining
 * letters map to digit classes, adjacent identical digits collapse, zeros are
 * dropped and the code is padded or cut to four symbols.
 *
 * @example
 * soundex("Robert") // "R163"
 * soundex("Sarah") // "S600"
 */
export function soundex(word: string): string {
  if (!word) return '';

  const upper = word.toUpperCase();
  const digits = Array.from(upper.slice(1).replace(/[HW]/g, ''), soundexDigit);

  const collapsed = digits.filter((digit, i) => i === 0 || digit !== digits[i - 1]);
  const coded = collapsed.filter((digit) => digit !== '0').join('');

  return `${upper.charAt(0)}${coded}000`.slice(0, 4);
}

const isPhoneticVowel = (char: string): boolean =>
  char.length === 1 && PHONETIC_VOWELS.includes(char);

/**
 * Consonant substitutions shared by every position.
 * C, H, W and Y depend on their neighbours and are handled separately.
 */
const CONSONANT_CODES: Readonly<Record<string, string>> = {
  B: 'P',
  D: 'T',
  F: 'F',
  V: 'F',
  G: 'K',
  J: 'J',
  K: 'K',
  L: 'L',
  M: 'M',
  N: 'N',
  P: 'P',
  Q: 'K',
  R: 'R',
  S: 'S',
  T: 'T',
  X: 'KS',
  Z: 'S',
};

function encodeFirst(input: string): MetaphoneCodes {
  const first = input.charAt(0);

  if (isPhoneticVowel(first)) return { primary: 'A', alternate: 'A' };

  switch (first) {
    case 'C': {
      const code = input.length > 1 && 'EIY'.includes(input.charAt(1)) ? 'S' : 'K';
      return { primary: code, alternate: code };
    }
    case 'H':
      return { primary: 'H', alternate: 'H' };
    case 'W':
      return { primary: 'W', alternate: 'W' };
    case 'Y':
      return { primary: 'Y', alternate: 'A' };
    default: {
      const code = CONSONANT_CODES[first] ?? first;
      return { primary: code, alternate: code };
    }
  }
}

/**
 * Double-Metaphone-like encoding.
 *
 * Vowels are only coded at the start of the word (as "A"). A consonant equal
 * to the character before it is skipped. H after a vowel survives in the
 * primary code only; W and Y survive only before a vowel.
 *
 * @example
 * doubleMetaphone("Sarah") // { primary: "SRH", alternate: "SR" }
 * doubleMetaphone("Yusuf") // { primary: "YSF", alternate: "ASF" }
 */
export function doubleMetaphone(word: string): MetaphoneCodes {
  if (!word) return { primary: '', alternate: '' };

  const input = word.toUpperCase();
  let { primary, alternate } = encodeFirst(input);

  for (let i = 1; i < input.length; i++) {
    const char = input.charAt(i);
    const prev = input.charAt(i - 1);
    const next = input.charAt(i + 1);

    if (isPhoneticVowel(char)) continue;
    if (char === prev) continue;

    switch (char) {
      case 'C': {
        const code = next !== '' && 'EIY'.includes(next) ? 'S' : 'K';
        primary += code;
        alternate += code;
        break;
      }
      case 'H':
        if (isPhoneticVowel(prev)) primary += 'H';
        break;
      case 'W':
      case 'Y':
        if (isPhoneticVowel(next)) {
          primary += char;
          alternate += char;
        }
        break;
      default: {
        const code = CONSONANT_CODES[char];
        if (code) {
          primary += code;
          alternate += code;
        }
      }
    }
  }

  return { primary, alternate };
}
