import { describe, it, expect } from 'vitest';
import { InvalidQueryError, UnrecognizedQueryError } from '../src/errors.js';
import { normalizeQuery, translateQuery, type ClauseMatcher } from '../src/query-translator.js';

describe('translateQuery', () => {
  describe('input validation', () => {
    it('should reject empty and whitespace-only text', () => {
      expect(() => translateQuery('')).toThrow(InvalidQueryError);
      expect(() => translateQuery('   \t ')).toThrow(InvalidQueryError);
    });

    it('should reject text that normalizes to nothing', () => {
      expect(() => translateQuery('?!')).toThrow(InvalidQueryError);
    });

    it('should fail with UnrecognizedQueryError when no clause matches', () => {
      expect(() => translateQuery('banana smoothie recipes')).toThrow(UnrecognizedQueryError);
    });
  });

  describe('palindrome clauses', () => {
    it('should read palindromic intent', () => {
      expect(translateQuery('palindromic strings')).toEqual({ isPalindrome: true });
      expect(translateQuery('show me palindromes')).toEqual({ isPalindrome: true });
    });

    it('should read negated palindrome intent', () => {
      expect(translateQuery('non-palindromic strings')).toEqual({ isPalindrome: false });
      expect(translateQuery('strings that are not palindromes')).toEqual({ isPalindrome: false });
      expect(translateQuery('anything that is not a palindrome')).toEqual({ isPalindrome: false });
      expect(translateQuery('non palindromic strings')).toEqual({ isPalindrome: false });
    });

    it('should read contracted negations', () => {
      expect(translateQuery("strings that aren't palindromes")).toEqual({ isPalindrome: false });
      expect(translateQuery('one that isn’t a palindrome')).toEqual({ isPalindrome: false });
      expect(translateQuery("a string that isn't palindromic")).toEqual({ isPalindrome: false });
    });

    it('should ignore case', () => {
      expect(translateQuery('NOT PALINDROMIC')).toEqual({ isPalindrome: false });
    });
  });

  describe('length clauses', () => {
    it('should turn "longer than N" into an exclusive lower bound', () => {
      expect(translateQuery('strings longer than 5 characters')).toEqual({ minLength: 6 });
      expect(translateQuery('more than 3 characters')).toEqual({ minLength: 4 });
      expect(translateQuery('more than 3 chars')).toEqual({ minLength: 4 });
    });

    it('should turn "at least N characters" into an inclusive lower bound', () => {
      expect(translateQuery('at least 4 characters')).toEqual({ minLength: 4 });
      expect(translateQuery('at least one character')).toEqual({ minLength: 1 });
    });

    it('should turn "shorter than N" into an exclusive upper bound', () => {
      expect(translateQuery('strings shorter than 10')).toEqual({ maxLength: 9 });
      expect(translateQuery('fewer than twelve characters')).toEqual({ maxLength: 11 });
      expect(translateQuery('less than 10 characters')).toEqual({ maxLength: 9 });
    });

    it('should turn "at most N characters" into an inclusive upper bound', () => {
      expect(translateQuery('at most 8 characters')).toEqual({ maxLength: 8 });
      expect(translateQuery('no more than 8 characters')).toEqual({ maxLength: 8 });
      expect(translateQuery('at most 4 char')).toEqual({ maxLength: 4 });
    });

    it('should drop a clause whose number is not a safe integer', () => {
      expect(() => translateQuery('longer than 99999999999999999999')).toThrow(UnrecognizedQueryError);
    });
  });

  describe('word count clauses', () => {
    it('should read digits and spelled-out cardinals', () => {
      expect(translateQuery('strings with 2 words')).toEqual({ wordCount: 2 });
      expect(translateQuery('seventeen words')).toEqual({ wordCount: 17 });
      expect(translateQuery('three-word strings')).toEqual({ wordCount: 3 });
      expect(translateQuery('Twenty words')).toEqual({ wordCount: 20 });
      expect(translateQuery('zero words')).toEqual({ wordCount: 0 });
    });

    it('should read "single word"', () => {
      expect(translateQuery('all single word palindromic strings')).toEqual({
        wordCount: 1,
        isPalindrome: true,
      });
    });

    it('should not read a comparison on words as an exact count', () => {
      expect(() => translateQuery('more than 3 words')).toThrow(UnrecognizedQueryError);
    });
  });

  describe('character clauses', () => {
    it('should keep the contained letter as typed', () => {
      expect(translateQuery('strings containing the letter Z')).toEqual({ containsCharacter: 'Z' });
      expect(translateQuery('Strings Containing The Letter z')).toEqual({ containsCharacter: 'z' });
      expect(translateQuery('words that contain the character @')).toEqual({ containsCharacter: '@' });
    });

    it('should read "the first vowel" as a', () => {
      expect(translateQuery('strings that contain the first vowel')).toEqual({ containsCharacter: 'a' });
    });
  });

  describe('combined clauses', () => {
    it('should merge clauses for different fields', () => {
      expect(translateQuery('palindromic strings that have three words')).toEqual({
        isPalindrome: true,
        wordCount: 3,
      });
    });

    it('should let the clause written last win for the same field', () => {
      expect(translateQuery('two words, actually five words')).toEqual({ wordCount: 5 });
      expect(translateQuery('palindromes, or rather non-palindromes')).toEqual({ isPalindrome: false });
    });

    it('should keep contradictory bounds instead of rejecting them', () => {
      expect(translateQuery('longer than 5 and shorter than 3')).toEqual({ minLength: 6, maxLength: 2 });
    });
  });

  it('should accept a custom matcher table', () => {
    const matchers: ClauseMatcher[] = [
      { name: 'smiley', pattern: /\bsmiley\b/gi, toFragment: () => ({ containsCharacter: '😀' }) },
    ];
    expect(translateQuery('Smiley strings', matchers)).toEqual({ containsCharacter: '😀' });
  });
});

describe('normalizeQuery', () => {
  it('should drop punctuation and collapse whitespace', () => {
    expect(normalizeQuery('  Strings, LONGER   than 5!! ')).toBe('Strings LONGER than 5');
  });

  it('should spell out contracted negations', () => {
    expect(normalizeQuery("they aren't")).toBe('they aren not');
  });

  it('should keep key symbols', () => {
    expect(normalizeQuery('Contains #, not "quotes"')).toBe('Contains # not quotes');
  });
});
