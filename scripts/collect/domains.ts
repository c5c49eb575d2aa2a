import type {
  DictionaryEntry,
  LexicalDomain,
  PhrasebookEntry,
  SecondaryLangKey,
} from '@shared/lexical';
import type { BatchMeta } from '@shared/lexical-schemas';

import { normalizeDictionaryEntry, normalizePhrasebookEntry } from './normalizers';

export interface DomainDefinition<TEntry> {
  domain: LexicalDomain;
  /** Directory under the data root holding `<source>/parsed/*.json` batches. */
  directory: string;
  filePrefix: string;
  secondaryKey: SecondaryLangKey;
  normalizeEntry(raw: unknown, meta: BatchMeta): TEntry;
}

export const DICTIONARY_DOMAIN: DomainDefinition<DictionaryEntry> = {
  domain: 'dictionary',
  directory: 'dictionaries',
  filePrefix: 'dictionary',
  secondaryKey: 'definition_lang',
  normalizeEntry: normalizeDictionaryEntry,
};

export const PHRASEBOOK_DOMAIN: DomainDefinition<PhrasebookEntry> = {
  domain: 'phrasebook',
  directory: 'phrasebooks',
  filePrefix: 'phrasebook',
  secondaryKey: 'translation_lang',
  normalizeEntry: normalizePhrasebookEntry,
};
