import { InvalidQueryError, UnrecognizedQueryError } from './errors.js';
import { isEmptyPredicate, type FilterPredicate } from './filters.js';

/**
 * Natural-language filter parser.
 *
 * A query is normalized, then every clause matcher in CLAUSE_MATCHERS is run
 * over it case-insensitively, so a contained character keeps the case it was
 * typed in. Each match yields a predicate fragment; fragments are merged in the
 * order their clauses appear in the text, so when two clauses set the same
 * field the one written last wins. Contradictory bounds are kept as they are
 * and simply match nothing.
 */

export interface ClauseMatcher {
  name: string;
  /** Must carry the global flag; add the i flag to ignore case */
  pattern: RegExp;
  toFragment(match: RegExpMatchArray): FilterPredicate | undefined;
}

const CARDINALS = new Map<string, number>([
  ['zero', 0],
  ['one', 1],
  ['two', 2],
  ['three', 3],
  ['four', 4],
  ['five', 5],
  ['six', 6],
  ['seven', 7],
  ['eight', 8],
  ['nine', 9],
  ['ten', 10],
  ['eleven', 11],
  ['twelve', 12],
  ['thirteen', 13],
  ['fourteen', 14],
  ['fifteen', 15],
  ['sixteen', 16],
  ['seventeen', 17],
  ['eighteen', 18],
  ['nineteen', 19],
  ['twenty', 20],
]);

const NUMBER = `(\\d+|${[...CARDINALS.keys()].join('|')})`;
const CHARACTERS = '(?:characters?|chars?)';
const CONTAINS = '(?:contains?|containing|with|having|has|includes?|including)';
const NEGATION = '(?:not\\s(?:a\\s)?|non-?\\s?)';
const PALINDROME = 'palindrom(?:e|es|ic)';

// Characters other than letters, digits, whitespace and these are dropped
const NORMALIZE_PATTERN = /[^\p{L}\p{N}\s@#$%&*+\-=_/\\<>~^|]/gu;

function clause(source: string): RegExp {
  return new RegExp(source, 'giu');
}

function parseNumber(token: string | undefined): number | undefined {
  if (token === undefined) return undefined;
  const value = /^\d+$/.test(token) ? Number.parseInt(token, 10) : CARDINALS.get(token.toLowerCase());
  return value !== undefined && Number.isSafeInteger(value) ? value : undefined;
}

function numeric(
  build: (n: number) => FilterPredicate,
): (match: RegExpMatchArray) => FilterPredicate | undefined {
  return match => {
    const n = parseNumber(match[1]);
    return n === undefined ? undefined : build(n);
  };
}

export const CLAUSE_MATCHERS: readonly ClauseMatcher[] = [
  {
    name: 'not-palindrome',
    pattern: clause(`\\b${NEGATION}${PALINDROME}\\b`),
    toFragment: () => ({ isPalindrome: false }),
  },
  {
    name: 'palindrome',
    pattern: clause(`(?<!\\b${NEGATION})\\b${PALINDROME}\\b`),
    toFragment: () => ({ isPalindrome: true }),
  },
  {
    name: 'longer-than',
    pattern: clause(`\\blonger\\sthan\\s${NUMBER}\\b`),
    toFragment: numeric(n => ({ minLength: n + 1 })),
  },
  {
    name: 'more-than-characters',
    pattern: clause(`(?<!\\bno\\s)\\bmore\\sthan\\s${NUMBER}\\s${CHARACTERS}\\b`),
    toFragment: numeric(n => ({ minLength: n + 1 })),
  },
  {
    name: 'at-least-characters',
    pattern: clause(`\\bat\\sleast\\s${NUMBER}\\s${CHARACTERS}\\b`),
    toFragment: numeric(n => ({ minLength: n })),
  },
  {
    name: 'shorter-than',
    pattern: clause(`\\bshorter\\sthan\\s${NUMBER}\\b`),
    toFragment: numeric(n => ({ maxLength: n - 1 })),
  },
  {
    name: 'less-than-characters',
    pattern: clause(`\\b(?:less|fewer)\\sthan\\s${NUMBER}\\s${CHARACTERS}\\b`),
    toFragment: numeric(n => ({ maxLength: n - 1 })),
  },
  {
    name: 'at-most-characters',
    pattern: clause(`\\b(?:at\\smost|no\\smore\\sthan)\\s${NUMBER}\\s${CHARACTERS}\\b`),
    toFragment: numeric(n => ({ maxLength: n })),
  },
  {
    name: 'word-count',
    pattern: clause(`(?<!\\b(?:than|least|most)\\s)\\b${NUMBER}[\\s-]words?\\b`),
    toFragment: numeric(n => ({ wordCount: n })),
  },
  {
    name: 'single-word',
    pattern: clause('\\b(?:single|one)[\\s-]word\\b'),
    toFragment: () => ({ wordCount: 1 }),
  },
  {
    name: 'contains-character',
    pattern: clause(`\\b${CONTAINS}\\s(?:(?:the|a)\\s)?(?:letter|character|char)\\s(\\S)(?=\\s|$)`),
    toFragment: match => (match[1] === undefined ? undefined : { containsCharacter: match[1] }),
  },
  {
    // "the first vowel" is read as the letter a
    name: 'contains-first-vowel',
    pattern: clause(`\\b${CONTAINS}\\s(?:the\\s)?first\\svowel\\b`),
    toFragment: () => ({ containsCharacter: 'a' }),
  },
];

// "aren't" reads as "aren not" once the apostrophe would otherwise be lost
const CONTRACTED_NOT = /n['’]t\b/giu;

export function normalizeQuery(text: string): string {
  return text
    .replace(CONTRACTED_NOT, 'n not')
    .replace(NORMALIZE_PATTERN, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

interface PositionedFragment {
  index: number;
  fragment: FilterPredicate;
}

export function translateQuery(
  text: string,
  matchers: readonly ClauseMatcher[] = CLAUSE_MATCHERS,
): FilterPredicate {
  if (text.trim().length === 0) {
    throw new InvalidQueryError('Bad Request: Query must not be empty');
  }

  const normalized = normalizeQuery(text);
  if (normalized.length === 0) {
    throw new InvalidQueryError('Bad Request: Query has nothing to interpret');
  }

  const fragments: PositionedFragment[] = [];
  for (const matcher of matchers) {
    for (const match of normalized.matchAll(matcher.pattern)) {
      const fragment = matcher.toFragment(match);
      if (fragment) {
        fragments.push({ index: match.index ?? 0, fragment });
      }
    }
  }

  // Stable sort: clauses at the same position keep matcher order
  fragments.sort((a, b) => a.index - b.index);

  const predicate: FilterPredicate = {};
  for (const { fragment } of fragments) {
    Object.assign(predicate, fragment);
  }

  if (isEmptyPredicate(predicate)) {
    throw new UnrecognizedQueryError('Unprocessable Entity: Unable to parse natural language query');
  }
  return predicate;
}
