import type { StringRecord } from './store.js';
import { InvalidInputError } from './errors.js';
import { describeIssues, filterQuerySchema } from './schemas.js';

/**
 * Structured condition over a record's properties. Absent fields impose no
 * constraint, present fields are ANDed.
 */
export interface FilterPredicate {
  isPalindrome?: boolean;
  minLength?: number;
  maxLength?: number;
  wordCount?: number;
  containsCharacter?: string;
}

export type SerializedPredicate = {
  is_palindrome?: boolean;
  min_length?: number;
  max_length?: number;
  word_count?: number;
  contains_character?: string;
};

export function matchesPredicate(record: StringRecord, predicate: FilterPredicate): boolean {
  const { properties } = record;

  if (predicate.isPalindrome !== undefined && properties.isPalindrome !== predicate.isPalindrome) {
    return false;
  }
  if (predicate.minLength !== undefined && properties.length < predicate.minLength) {
    return false;
  }
  if (predicate.maxLength !== undefined && properties.length > predicate.maxLength) {
    return false;
  }
  if (predicate.wordCount !== undefined && properties.wordCount !== predicate.wordCount) {
    return false;
  }
  if (
    predicate.containsCharacter !== undefined &&
    !properties.characterSet.includes(predicate.containsCharacter)
  ) {
    return false;
  }
  return true;
}

export function isEmptyPredicate(predicate: FilterPredicate): boolean {
  return Object.values(predicate).every(value => value === undefined);
}

// Builds a predicate from GET /strings query parameters
export function parseFilterQuery(query: unknown): FilterPredicate {
  const parsed = filterQuerySchema.safeParse(query);
  if (!parsed.success) {
    throw new InvalidInputError(describeIssues(parsed.error));
  }

  const params = parsed.data;
  const predicate: FilterPredicate = {};
  if (params.is_palindrome !== undefined) predicate.isPalindrome = params.is_palindrome;
  if (params.min_length !== undefined) predicate.minLength = params.min_length;
  if (params.max_length !== undefined) predicate.maxLength = params.max_length;
  if (params.word_count !== undefined) predicate.wordCount = params.word_count;
  if (params.contains_character !== undefined) predicate.containsCharacter = params.contains_character;
  return predicate;
}

export function serializePredicate(predicate: FilterPredicate): SerializedPredicate {
  const serialized: SerializedPredicate = {};
  if (predicate.isPalindrome !== undefined) serialized.is_palindrome = predicate.isPalindrome;
  if (predicate.minLength !== undefined) serialized.min_length = predicate.minLength;
  if (predicate.maxLength !== undefined) serialized.max_length = predicate.maxLength;
  if (predicate.wordCount !== undefined) serialized.word_count = predicate.wordCount;
  if (predicate.containsCharacter !== undefined) {
    serialized.contains_character = predicate.containsCharacter;
  }
  return serialized;
}
