export type LexicalDomain = 'dictionary' | 'phrasebook';

export type SecondaryLangKey = 'definition_lang' | 'translation_lang';

export interface Definition {
  description?: string;
  pos?: string;
  origin?: string;
  usage_note?: string;
  synonyms?: string[];
  antonyms?: string[];
  inflections?: string[];
  examples?: string[];
  source_title?: string;
  source_link?: string;
}

export interface DictionaryEntry {
  word: string;
  definitions?: Definition[];
}

export interface Translation {
  content?: string;
  examples?: string[];
  source_title?: string;
  source_link?: string;
}

export interface PhrasebookEntry {
  phrase: string;
  categories?: string[];
  usage_note?: string;
  translations?: Translation[];
}

export type AggregateMeta =
  | { lang: string; definition_lang: string }
  | { lang: string; translation_lang: string };

export interface AggregateDocument<TEntry> {
  meta: AggregateMeta;
  entries: TEntry[];
}

// Canonical key order. Pruning drops keys from these lists, it never reorders them.
export const DEFINITION_FIELDS = [
  'description',
  'pos',
  'origin',
  'usage_note',
  'synonyms',
  'antonyms',
  'inflections',
  'examples',
  'source_title',
  'source_link',
] as const satisfies ReadonlyArray<keyof Definition>;

export const DICTIONARY_ENTRY_FIELDS = ['word', 'definitions'] as const satisfies ReadonlyArray<
  keyof DictionaryEntry
>;

export const TRANSLATION_FIELDS = [
  'content',
  'examples',
  'source_title',
  'source_link',
] as const satisfies ReadonlyArray<keyof Translation>;

export const PHRASEBOOK_ENTRY_FIELDS = [
  'phrase',
  'categories',
  'usage_note',
  'translations',
] as const satisfies ReadonlyArray<keyof PhrasebookEntry>;
