import { Router, type Request, type Response } from 'express';
import { hashValue } from '../analyzer.js';
import { InvalidInputError, InvalidQueryError, InvalidValueError } from '../errors.js';
import { isEmptyPredicate, parseFilterQuery, serializePredicate } from '../filters.js';
import type { Logger } from '../logger.js';
import { translateQuery } from '../query-translator.js';
import { createStringBodySchema, describeIssues, naturalLanguageQuerySchema } from '../schemas.js';
import type { StringRecord, StringStore } from '../store.js';

export interface StringResponse {
  id: string;
  value: string;
  properties: {
    length: number;
    is_palindrome: boolean;
    unique_characters: number;
    word_count: number;
    sha256_hash: string;
    character_set: readonly string[];
    character_frequency_map: Readonly<Record<string, number>>;
  };
  created_at: string;
}

export function toStringResponse(record: StringRecord): StringResponse {
  const { properties } = record;
  return {
    id: record.id,
    value: record.value,
    properties: {
      length: properties.length,
      is_palindrome: properties.isPalindrome,
      unique_characters: properties.uniqueCharacters,
      word_count: properties.wordCount,
      sha256_hash: record.hash,
      character_set: properties.characterSet,
      character_frequency_map: properties.characterFrequencyMap,
    },
    created_at: record.createdAt.toISOString(),
  };
}

export function stringsRouter(store: StringStore, logger: Logger): Router {
  const router = Router();

  // 1. Create/Analyze String Endpoint
  router.post('/', (req: Request, res: Response) => {
    const body = createStringBodySchema.safeParse(req.body);
    if (!body.success) {
      throw new InvalidInputError(describeIssues(body.error));
    }

    const { value } = body.data;
    if (value.trim().length === 0) {
      throw new InvalidValueError('Unprocessable Entity: "value" must not be empty');
    }

    const record = store.put(value);
    logger.info(`Stored string ${record.hash}`);
    res.status(201).json(toStringResponse(record));
  });

  // 2. Natural Language Filtering Endpoint (registered before /:stringValue)
  router.get('/filter-by-natural-language', (req: Request, res: Response) => {
    const params = naturalLanguageQuerySchema.safeParse(req.query);
    if (!params.success) {
      throw new InvalidQueryError(describeIssues(params.error));
    }

    const { query } = params.data;
    const predicate = translateQuery(query);
    const data = store.list(predicate).map(toStringResponse);

    res.status(200).json({
      data,
      count: data.length,
      interpreted_query: {
        original: query,
        parsed_filters: serializePredicate(predicate),
      },
    });
  });

  // 3. Get Specific String Endpoint
  router.get('/:stringValue', (req: Request, res: Response) => {
    const record = store.get(hashValue(req.params.stringValue));
    res.status(200).json(toStringResponse(record));
  });

  // 4. Get All Strings with Filtering Endpoint
  router.get('/', (req: Request, res: Response) => {
    const predicate = parseFilterQuery(req.query);
    const data = store.list(predicate).map(toStringResponse);

    res.status(200).json({
      data,
      count: data.length,
      filters_applied: isEmptyPredicate(predicate) ? undefined : serializePredicate(predicate),
    });
  });

  // 5. Delete String Endpoint
  router.delete('/:stringValue', (req: Request, res: Response) => {
    const hash = hashValue(req.params.stringValue);
    store.delete(hash);
    logger.info(`Deleted string ${hash}`);
    res.status(204).send();
  });

  return router;
}
