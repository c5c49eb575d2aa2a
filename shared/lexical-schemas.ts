import { z } from 'zod';

const optionalText = z.string().nullish();
const optionalTextList = z.array(z.string()).nullish();

export const batchMetaSchema = z
  .object({
    lang: z.string().nullish(),
    definition_lang: z.string().nullish(),
    translation_lang: z.string().nullish(),
    source_title: optionalText,
    source_link: optionalText,
  })
  .passthrough();

export const batchSchema = z.object({
  meta: batchMetaSchema,
  entries: z.array(z.unknown()),
});

export const rawDefinitionSchema = z.object({
  description: optionalText,
  pos: optionalText,
  origin: optionalText,
  usage_note: optionalText,
  synonyms: optionalTextList,
  antonyms: optionalTextList,
  inflections: optionalTextList,
  examples: optionalTextList,
  source_title: optionalText,
  source_link: optionalText,
});

export const rawDictionaryEntrySchema = z.object({
  word: z.string().min(1),
  definitions: z.array(rawDefinitionSchema).nullish(),
});

export const rawTranslationSchema = z.object({
  content: optionalText,
  examples: optionalTextList,
  source_title: optionalText,
  source_link: optionalText,
});

export const rawPhrasebookEntrySchema = z.object({
  phrase: z.string().min(1),
  categories: optionalTextList,
  usage_note: optionalText,
  translations: z.array(rawTranslationSchema).nullish(),
});

export type BatchMeta = z.infer<typeof batchMetaSchema>;
export type Batch = z.infer<typeof batchSchema>;
export type RawDefinition = z.infer<typeof rawDefinitionSchema>;
export type RawDictionaryEntry = z.infer<typeof rawDictionaryEntrySchema>;
export type RawTranslation = z.infer<typeof rawTranslationSchema>;
export type RawPhrasebookEntry = z.infer<typeof rawPhrasebookEntrySchema>;

export function formatSchemaIssues(issues: readonly z.ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length ? issue.path.join('.') : '(root)';
    return `${location}: ${issue.message}`;
  });
}
