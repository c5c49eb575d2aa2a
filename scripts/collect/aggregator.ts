import type { AggregateMeta, SecondaryLangKey } from '@shared/lexical';
import type { Batch, BatchMeta } from '@shared/lexical-schemas';

import { createLogger } from '../logger';
import type { DomainDefinition } from './domains';
import { EntryNormalizationError, GroupNameCollisionError, MissingKeyError } from './errors';

const logger = createLogger('collect');

export interface GroupKey {
  /** Unambiguous map key for the language pair. */
  id: string;
  lang: string;
  secondaryKey: SecondaryLangKey;
  secondaryLang: string;
}

export interface AggregateGroup<TEntry> {
  key: GroupKey;
  meta: AggregateMeta;
  entries: TEntry[];
}

export interface BatchMergeSummary {
  sourcePath: string | null;
  groupId: string;
  accepted: number;
  skipped: number;
}

export interface AggregationOptions {
  logSkippedEntries?: boolean;
}

function requireMetaValue(meta: BatchMeta, key: string, sourcePath: string | null): string {
  const value = meta[key];
  if (typeof value !== 'string' || !value) {
    throw new MissingKeyError(key, sourcePath);
  }
  return value;
}

/** `<lang>_<secondaryLang>`, the part of the output file name the pair contributes. */
export function pairName(key: Pick<GroupKey, 'lang' | 'secondaryLang'>): string {
  return `${key.lang}_${key.secondaryLang}`;
}

function buildGroupMeta(key: GroupKey): AggregateMeta {
  return key.secondaryKey === 'definition_lang'
    ? { lang: key.lang, definition_lang: key.secondaryLang }
    : { lang: key.lang, translation_lang: key.secondaryLang };
}

/**
 * Accumulates normalized entries per language pair. Groups are created the
 * first time their key is seen and keep batch arrival order.
 */
export class AggregationContext<TEntry> {
  private readonly groupsById = new Map<string, AggregateGroup<TEntry>>();
  private readonly keysByName = new Map<string, GroupKey>();
  private readonly logSkippedEntries: boolean;
  private acceptedTotal = 0;
  private skippedTotal = 0;

  constructor(
    private readonly definition: DomainDefinition<TEntry>,
    options: AggregationOptions = {},
  ) {
    this.logSkippedEntries = options.logSkippedEntries ?? true;
  }

  get entryCount(): number {
    return this.acceptedTotal;
  }

  get skippedEntryCount(): number {
    return this.skippedTotal;
  }

  groupKeyFor(meta: BatchMeta, sourcePath: string | null = null): GroupKey {
    const lang = requireMetaValue(meta, 'lang', sourcePath);
    const secondaryKey = this.definition.secondaryKey;
    const secondaryLang = requireMetaValue(meta, secondaryKey, sourcePath);
    return { id: JSON.stringify([lang, secondaryLang]), lang, secondaryKey, secondaryLang };
  }

  addBatch(batch: Batch, sourcePath: string | null = null): BatchMergeSummary {
    const key = this.groupKeyFor(batch.meta, sourcePath);

    let group = this.groupsById.get(key.id);
    if (!group) {
      const name = pairName(key);
      const claimed = this.keysByName.get(name);
      if (claimed) {
        throw new GroupNameCollisionError(
          `${this.definition.filePrefix}_${name}`,
          claimed,
          key,
          sourcePath,
        );
      }
      this.keysByName.set(name, key);
      group = { key, meta: buildGroupMeta(key), entries: [] };
      this.groupsById.set(key.id, group);
    }

    let accepted = 0;
    let skipped = 0;
    for (const [index, raw] of batch.entries.entries()) {
      try {
        group.entries.push(this.definition.normalizeEntry(raw, batch.meta));
        accepted += 1;
      } catch (error) {
        if (!(error instanceof EntryNormalizationError)) {
          throw error;
        }
        skipped += 1;
        if (this.logSkippedEntries) {
          logger.warn({
            event: 'entry.skipped',
            message: `Skipped ${this.definition.domain} entry ${index} of ${sourcePath ?? 'batch'}`,
            data: { source: sourcePath, index, issues: error.issues },
          });
        }
      }
    }

    this.acceptedTotal += accepted;
    this.skippedTotal += skipped;

    logger.info({
      event: 'batch.merged',
      message: `Merged ${sourcePath ?? 'batch'} into ${this.definition.filePrefix}_${pairName(key)}`,
      data: { source: sourcePath, lang: key.lang, [key.secondaryKey]: key.secondaryLang, accepted, skipped },
    });

    return { sourcePath, groupId: key.id, accepted, skipped } satisfies BatchMergeSummary;
  }

  groups(): AggregateGroup<TEntry>[] {
    return Array.from(this.groupsById.values());
  }
}
