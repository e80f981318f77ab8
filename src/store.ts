import { analyzeString, hashValue, type StringProperties } from './analyzer.js';
import { DuplicateValueError, NotFoundError } from './errors.js';
import { matchesPredicate, type FilterPredicate } from './filters.js';

export interface StringRecord {
  id: string;
  value: string;
  hash: string;
  properties: StringProperties;
  createdAt: Date;
}

export interface StringStore {
  readonly size: number;
  put(value: string): StringRecord;
  get(hash: string): StringRecord;
  delete(hash: string): void;
  list(predicate?: FilterPredicate): StringRecord[];
}

export interface InMemoryStringStoreOptions {
  /** Clock used for createdAt (default: current time) */
  now?: () => Date;
}

function freezeProperties(properties: StringProperties): StringProperties {
  return Object.freeze({
    ...properties,
    characterSet: Object.freeze([...properties.characterSet]),
    characterFrequencyMap: Object.freeze({ ...properties.characterFrequencyMap }),
  });
}

/**
 * Keeps analyzed strings in a Map keyed by content hash. Records are frozen
 * all the way down before they are handed out. Every operation is
 * synchronous, so within one Node.js process a write is never observed half
 * done by a concurrent request.
 */
export class InMemoryStringStore implements StringStore {
  private readonly records = new Map<string, StringRecord>();
  private readonly now: () => Date;

  constructor(options: InMemoryStringStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.records.size;
  }

  put(value: string): StringRecord {
    const hash = hashValue(value);
    if (this.records.has(hash)) {
      throw new DuplicateValueError(hash);
    }

    const record: StringRecord = Object.freeze({
      id: hash,
      value,
      hash,
      properties: freezeProperties(analyzeString(value)),
      createdAt: this.now(),
    });
    this.records.set(hash, record);
    return record;
  }

  get(hash: string): StringRecord {
    const record = this.records.get(hash);
    if (!record) {
      throw new NotFoundError();
    }
    return record;
  }

  delete(hash: string): void {
    if (!this.records.delete(hash)) {
      throw new NotFoundError();
    }
  }

  // Insertion order, no implicit sort
  list(predicate: FilterPredicate = {}): StringRecord[] {
    return Array.from(this.records.values()).filter(record => matchesPredicate(record, predicate));
  }
}
