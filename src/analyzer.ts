import crypto from 'crypto';

export interface StringProperties {
  length: number;
  wordCount: number;
  isPalindrome: boolean;
  characterSet: readonly string[];
  uniqueCharacters: number;
  characterFrequencyMap: Readonly<Record<string, number>>;
}

// Content hash used as the storage key
export function hashValue(value: string): string {
  return crypto.createHash('sha256').update(value).digest('hex');
}

export function countWords(value: string): number {
  return value.trim().split(/\s+/).filter(word => word.length > 0).length;
}

/**
 * Case- and punctuation-insensitive palindrome check. Only letters and digits
 * take part in the comparison, so a string without any is a palindrome.
 */
export function isPalindrome(value: string): boolean {
  const cleaned = Array.from(value.toLowerCase().replace(/[^\p{L}\p{N}]/gu, ''));
  return cleaned.join('') === [...cleaned].reverse().join('');
}

// Helper function to analyze string properties
export function analyzeString(value: string): StringProperties {
  const characters = Array.from(value);

  // Map keeps first-seen order, which object keys do not for digits
  const frequencies = new Map<string, number>();
  for (const char of characters) {
    frequencies.set(char, (frequencies.get(char) ?? 0) + 1);
  }
  const characterSet = [...frequencies.keys()];

  return {
    length: characters.length,
    wordCount: countWords(value),
    isPalindrome: isPalindrome(value),
    characterSet,
    uniqueCharacters: characterSet.length,
    characterFrequencyMap: Object.fromEntries(frequencies),
  };
}
