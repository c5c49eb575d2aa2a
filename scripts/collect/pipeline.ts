import path from 'node:path';

import type { LexicalDomain } from '@shared/lexical';

import { createLogger } from '../logger';
import { AggregationContext } from './aggregator';
import { DICTIONARY_DOMAIN, PHRASEBOOK_DOMAIN, type DomainDefinition } from './domains';
import { readBatches } from './reader';
import { writeAggregateGroups, type WriteAggregatesResult } from './writer';

export const PROCESSED_DIR_NAME = 'processed_data';

const logger = createLogger('collect');

export interface CollectDomainOptions<TEntry> {
  definition: DomainDefinition<TEntry>;
  domainDir: string;
  outputDir?: string;
  signal?: AbortSignal;
  logSkippedEntries?: boolean;
}

export interface CollectDomainResult {
  domain: LexicalDomain;
  batches: number;
  entries: number;
  skippedEntries: number;
  cancelled: boolean;
  write: WriteAggregatesResult;
}

/**
 * Folds every parsed batch of one domain into per-language-pair aggregates and
 * writes them out. The abort signal is checked between batches; whatever has
 * been merged by then is still written. Fatal batch errors propagate before
 * anything is written.
 */
export async function collectDomain<TEntry>(
  options: CollectDomainOptions<TEntry>,
): Promise<CollectDomainResult> {
  const { definition, domainDir, signal } = options;
  const outputDir = options.outputDir ?? path.join(domainDir, PROCESSED_DIR_NAME);
  const context = new AggregationContext(definition, {
    logSkippedEntries: options.logSkippedEntries,
  });

  let batches = 0;
  let cancelled = false;

  for await (const { path: sourcePath, batch } of readBatches(domainDir)) {
    if (signal?.aborted) {
      cancelled = true;
      break;
    }
    context.addBatch(batch, sourcePath);
    batches += 1;
  }

  if (!cancelled && signal?.aborted) {
    cancelled = true;
  }

  if (cancelled) {
    logger.warn({
      event: 'collect.cancelled',
      message: `Interrupted after ${batches} batch(es); saving collected ${definition.directory}`,
    });
  } else if (batches === 0) {
    logger.info({
      event: 'collect.empty',
      message: `No parsed batches found under ${domainDir}`,
    });
  }

  const write = await writeAggregateGroups(context.groups(), {
    outputDir,
    filePrefix: definition.filePrefix,
  });

  logger.info({
    event: 'collect.completed',
    message: `${definition.directory} collected`,
    data: {
      batches,
      entries: context.entryCount,
      skippedEntries: context.skippedEntryCount,
      written: write.written.length,
      failed: write.failed.length,
      cancelled,
    },
  });

  return {
    domain: definition.domain,
    batches,
    entries: context.entryCount,
    skippedEntries: context.skippedEntryCount,
    cancelled,
    write,
  } satisfies CollectDomainResult;
}

export interface CollectLexicalDataOptions {
  domain: LexicalDomain;
  dataDir: string;
  outputDir?: string;
  signal?: AbortSignal;
  logSkippedEntries?: boolean;
}

export function collectLexicalData(options: CollectLexicalDataOptions): Promise<CollectDomainResult> {
  const { domain, dataDir, ...rest } = options;
  switch (domain) {
    case 'dictionary':
      return collectDomain({
        definition: DICTIONARY_DOMAIN,
        domainDir: path.join(dataDir, DICTIONARY_DOMAIN.directory),
        ...rest,
      });
    case 'phrasebook':
      return collectDomain({
        definition: PHRASEBOOK_DOMAIN,
        domainDir: path.join(dataDir, PHRASEBOOK_DOMAIN.directory),
        ...rest,
      });
  }
}
