import { describe, expect, it } from 'vitest';

import { DEFINITION_FIELDS, TRANSLATION_FIELDS } from '../../../shared/lexical';
import type { BatchMeta } from '../../../shared/lexical-schemas';
import { EntryNormalizationError } from '../../../scripts/collect/errors';
import {
  normalizeDefinition,
  normalizeDictionaryEntry,
  normalizePhrasebookEntry,
  normalizeTranslation,
} from '../../../scripts/collect/normalizers';

const meta: BatchMeta = {
  lang: 'tgl',
  definition_lang: 'eng',
  source_title: 'Sample Source',
  source_link: 'https://example.test/source',
};

function isOrderedSubsequence(keys: string[], order: readonly string[]): boolean {
  let position = 0;
  for (const key of keys) {
    const found = order.indexOf(key, position);
    if (found === -1) {
      return false;
    }
    position = found + 1;
  }
  return true;
}

describe('dictionary normalization', () => {
  it('orders definition fields canonically regardless of input order', () => {
    const definition = normalizeDefinition(
      {
        examples: ['Tumahol ang aso.'],
        source_link: 'https://example.test/aso',
        pos: 'noun',
        description: 'dog',
        synonyms: ['tuta'],
      },
      {},
    );

    expect(Object.keys(definition)).toEqual([
      'description',
      'pos',
      'synonyms',
      'examples',
      'source_link',
    ]);
    expect(isOrderedSubsequence(Object.keys(definition), DEFINITION_FIELDS)).toBe(true);
  });

  it('inherits source title and link from batch meta when omitted', () => {
    expect(normalizeDefinition({ description: 'dog' }, meta)).toEqual({
      description: 'dog',
      source_title: 'Sample Source',
      source_link: 'https://example.test/source',
    });
  });

  it('keeps an explicit source title over the inherited one', () => {
    const definition = normalizeDefinition({ description: 'cat', source_title: 'Own Source' }, meta);
    expect(definition.source_title).toBe('Own Source');
    expect(definition.source_link).toBe('https://example.test/source');
  });

  it('prunes empty values including explicit null and empty sources', () => {
    const definition = normalizeDefinition(
      {
        description: 'house',
        pos: '',
        origin: null,
        synonyms: [],
        antonyms: [],
        source_title: null,
        source_link: '',
      },
      meta,
    );
    expect(definition).toEqual({ description: 'house' });
  });

  it('leaves sources absent when neither record nor meta has them', () => {
    expect(normalizeDefinition({ description: 'tree' }, { lang: 'tgl', definition_lang: 'eng' })).toEqual(
      { description: 'tree' },
    );
  });

  it('normalizes every definition of an entry in order', () => {
    const entry = normalizeDictionaryEntry(
      {
        word: 'bahay',
        definitions: [{ description: 'house' }, { description: 'home', usage_note: 'informal' }],
        ignored: 'value',
      },
      { lang: 'tgl', definition_lang: 'eng', source_title: 'S1' },
    );

    expect(entry).toEqual({
      word: 'bahay',
      definitions: [
        { description: 'house', source_title: 'S1' },
        { description: 'home', usage_note: 'informal', source_title: 'S1' },
      ],
    });
    expect(Object.keys(entry)).toEqual(['word', 'definitions']);
  });

  it('prunes the definitions list when it is missing or empty', () => {
    expect(normalizeDictionaryEntry({ word: 'wala' }, meta)).toEqual({ word: 'wala' });
    expect(normalizeDictionaryEntry({ word: 'wala', definitions: [] }, meta)).toEqual({
      word: 'wala',
    });
  });

  it('rejects entries without a word', () => {
    expect(() => normalizeDictionaryEntry({ definitions: [] }, meta)).toThrow(EntryNormalizationError);
    expect(() => normalizeDictionaryEntry({ word: '' }, meta)).toThrow(EntryNormalizationError);
  });

  it('reports the path of malformed nested fields', () => {
    try {
      normalizeDictionaryEntry({ word: 'aso', definitions: [{ synonyms: 'tuta' }] }, meta);
      expect.unreachable('normalization should have failed');
    } catch (error) {
      expect(error).toBeInstanceOf(EntryNormalizationError);
      if (error instanceof EntryNormalizationError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]).toMatch(/^definitions\.0\.synonyms: /);
      }
    }
  });
});

describe('phrasebook normalization', () => {
  const phrasebookMeta: BatchMeta = {
    lang: 'eng',
    translation_lang: 'tgl',
    source_title: 'Travel Phrases',
  };

  it('orders entry and translation fields canonically', () => {
    const entry = normalizePhrasebookEntry(
      {
        translations: [{ source_link: 'https://example.test/p', content: 'Salamat' }],
        usage_note: 'polite',
        categories: ['basics'],
        phrase: 'Thank you',
      },
      phrasebookMeta,
    );

    expect(Object.keys(entry)).toEqual(['phrase', 'categories', 'usage_note', 'translations']);
    expect(entry.translations).toEqual([
      { content: 'Salamat', source_title: 'Travel Phrases', source_link: 'https://example.test/p' },
    ]);
  });

  it('normalizes a translation with inherited and explicit sources', () => {
    const translation = normalizeTranslation(
      { content: 'Magandang umaga', examples: [], source_title: 'Own' },
      phrasebookMeta,
    );
    expect(translation).toEqual({ content: 'Magandang umaga', source_title: 'Own' });
    expect(Object.keys(translation).every((key) => TRANSLATION_FIELDS.some((field) => field === key))).toBe(
      true,
    );
  });

  it('treats missing translations as empty and prunes them', () => {
    expect(normalizePhrasebookEntry({ phrase: 'Hello', categories: [] }, phrasebookMeta)).toEqual({
      phrase: 'Hello',
    });
  });

  it('rejects entries without a phrase', () => {
    expect(() => normalizePhrasebookEntry({ translations: [] }, phrasebookMeta)).toThrow(
      EntryNormalizationError,
    );
    expect(() => normalizePhrasebookEntry('Hello', phrasebookMeta)).toThrow(EntryNormalizationError);
  });
});
