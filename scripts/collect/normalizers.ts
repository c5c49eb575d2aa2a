import type { z } from 'zod';

import {
  DEFINITION_FIELDS,
  TRANSLATION_FIELDS,
  type Definition,
  type DictionaryEntry,
  type PhrasebookEntry,
  type Translation,
} from '@shared/lexical';
import {
  formatSchemaIssues,
  rawDictionaryEntrySchema,
  rawPhrasebookEntrySchema,
  type BatchMeta,
  type RawDefinition,
  type RawTranslation,
} from '@shared/lexical-schemas';

import { EntryNormalizationError } from './errors';
import { compactRecord, inheritFromMeta } from './records';

function parseRawEntry<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown,
  kind: string,
): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new EntryNormalizationError(kind, formatSchemaIssues(parsed.error.issues));
  }
  return parsed.data;
}

export function normalizeDefinition(raw: RawDefinition, meta: BatchMeta): Definition {
  return compactRecord(
    {
      description: raw.description,
      pos: raw.pos,
      origin: raw.origin,
      usage_note: raw.usage_note,
      synonyms: raw.synonyms,
      antonyms: raw.antonyms,
      inflections: raw.inflections,
      examples: raw.examples,
      source_title: inheritFromMeta(raw.source_title, meta.source_title),
      source_link: inheritFromMeta(raw.source_link, meta.source_link),
    },
    DEFINITION_FIELDS,
  );
}

export function normalizeDictionaryEntry(raw: unknown, meta: BatchMeta): DictionaryEntry {
  const entry = parseRawEntry(rawDictionaryEntrySchema, raw, 'dictionary entry');
  const definitions = (entry.definitions ?? []).map((definition) =>
    normalizeDefinition(definition, meta),
  );

  return {
    word: entry.word,
    ...compactRecord({ definitions }, ['definitions'] as const),
  } satisfies DictionaryEntry;
}

export function normalizeTranslation(raw: RawTranslation, meta: BatchMeta): Translation {
  return compactRecord(
    {
      content: raw.content,
      examples: raw.examples,
      source_title: inheritFromMeta(raw.source_title, meta.source_title),
      source_link: inheritFromMeta(raw.source_link, meta.source_link),
    },
    TRANSLATION_FIELDS,
  );
}

export function normalizePhrasebookEntry(raw: unknown, meta: BatchMeta): PhrasebookEntry {
  const entry = parseRawEntry(rawPhrasebookEntrySchema, raw, 'phrasebook entry');
  // A missing `translations` list is treated like an empty one.
  const translations = (entry.translations ?? []).map((translation) =>
    normalizeTranslation(translation, meta),
  );

  return {
    phrase: entry.phrase,
    ...compactRecord(
      {
        categories: entry.categories,
        usage_note: entry.usage_note,
        translations,
      },
      ['categories', 'usage_note', 'translations'] as const,
    ),
  } satisfies PhrasebookEntry;
}
