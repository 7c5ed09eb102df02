/**
 * Deterministic in-process extractor driven by keyword tables.
 * Keywords match at the start of a word, case-insensitively, so "analy"
 * matches both "analyze" and "analytics".
 */

import * as fs from 'fs';
import { z } from 'zod';

import { getBundledPath } from '../config.js';
import { DATA_DIR_NAME, KEYWORD_LEXICON_FILE } from '../constants.js';
import { ParseError } from '../errors.js';
import { formatIssues } from '../rules/schema.js';
import type { AccessPattern, DataType, ICriteria, SearchIntensity, StorageIntent } from '../types.js';
import type { ICriteriaExtractor } from './types.js';

const KeywordListSchema = z.array(z.string().min(1));

export const KeywordLexiconSchema = z.object({
  memory: KeywordListSchema,
  semantic: KeywordListSchema,
  search_verbs: KeywordListSchema,
  content_nouns: KeywordListSchema,
  file: KeywordListSchema,
  database: KeywordListSchema,
  query: KeywordListSchema,
  tracking_verbs: KeywordListSchema,
  filter: KeywordListSchema,
  analytic: KeywordListSchema,
  binary: KeywordListSchema,
  numeric: KeywordListSchema,
  text: KeywordListSchema,
  structured: KeywordListSchema,
  high_search: KeywordListSchema,
});

export type KeywordLexicon = z.infer<typeof KeywordLexiconSchema>;
type KeywordGroup = keyof KeywordLexicon;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function compileGroup(keywords: readonly string[]): RegExp {
  if (keywords.length === 0) return /(?!)/;
  const alternatives = keywords.map((keyword) => escapeRegExp(keyword.toLowerCase())).join('|');
  return new RegExp(`(?<![a-z0-9])(?:${alternatives})`);
}

/**
 * Read and validate a lexicon file; defaults to the one bundled with the package
 */
export function loadKeywordLexicon(filePath = getBundledPath(DATA_DIR_NAME, KEYWORD_LEXICON_FILE)): KeywordLexicon {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  const parsed = KeywordLexiconSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid keyword lexicon ${filePath}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export class KeywordExtractor implements ICriteriaExtractor {
  readonly name = 'keyword';
  private readonly patterns: Record<KeywordGroup, RegExp>;

  constructor(lexicon: KeywordLexicon = loadKeywordLexicon()) {
    this.patterns = {
      memory: compileGroup(lexicon.memory),
      semantic: compileGroup(lexicon.semantic),
      search_verbs: compileGroup(lexicon.search_verbs),
      content_nouns: compileGroup(lexicon.content_nouns),
      file: compileGroup(lexicon.file),
      database: compileGroup(lexicon.database),
      query: compileGroup(lexicon.query),
      tracking_verbs: compileGroup(lexicon.tracking_verbs),
      filter: compileGroup(lexicon.filter),
      analytic: compileGroup(lexicon.analytic),
      binary: compileGroup(lexicon.binary),
      numeric: compileGroup(lexicon.numeric),
      text: compileGroup(lexicon.text),
      structured: compileGroup(lexicon.structured),
      high_search: compileGroup(lexicon.high_search),
    };
  }

  async extract(request: string): Promise<ICriteria> {
    return this.classify(request);
  }

  /**
   * Synchronous classification; `extract` wraps it to satisfy the extractor contract
   */
  classify(request: string): ICriteria {
    const text = request.toLowerCase();
    const has = (group: KeywordGroup): boolean => this.patterns[group].test(text);

    const semantic = has('semantic');
    const searchVerb = has('search_verbs');
    const vectorSignal = semantic || (searchVerb && has('content_nouns'));

    let storageIntent: StorageIntent;
    if (has('memory')) {
      storageIntent = 'memory';
    } else if (vectorSignal) {
      storageIntent = 'vector';
    } else if (has('file')) {
      storageIntent = 'file';
    } else if (has('database')) {
      storageIntent = 'database';
    } else {
      throw new ParseError(request, `No storage intent found in request: "${request}"`);
    }

    let accessPattern: AccessPattern;
    if (searchVerb || semantic) {
      accessPattern = 'search';
    } else if (has('query') && !has('tracking_verbs')) {
      accessPattern = 'query';
    } else if (has('filter')) {
      accessPattern = 'filter';
    } else {
      accessPattern = 'crud';
    }

    let dataType: DataType;
    if (has('binary')) {
      dataType = 'binary';
    } else if (has('numeric')) {
      dataType = 'numeric';
    } else if (has('text')) {
      dataType = 'text';
    } else if (has('structured') || storageIntent === 'database') {
      dataType = 'structured';
    } else {
      dataType = 'text';
    }

    let searchIntensity: SearchIntensity = 'none';
    if (vectorSignal || has('high_search')) {
      searchIntensity = 'high';
    } else if (searchVerb) {
      searchIntensity = 'low';
    }

    return {
      storage_intent: storageIntent,
      access_pattern: accessPattern,
      analytic_intent: has('analytic'),
      data_type: dataType,
      search_intensity: searchIntensity,
    };
  }
}
