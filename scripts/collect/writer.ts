import fs from 'node:fs/promises';
import path from 'node:path';

import type { AggregateDocument } from '@shared/lexical';

import { createLogger } from '../logger';
import { pairName, type AggregateGroup, type GroupKey } from './aggregator';

const logger = createLogger('collect');

export interface WriteAggregatesOptions {
  outputDir: string;
  filePrefix: string;
}

export interface GroupWriteFailure {
  fileName: string;
  error: unknown;
}

export interface WriteAggregatesResult {
  written: string[];
  skipped: string[];
  failed: GroupWriteFailure[];
}

export function aggregateFileName(filePrefix: string, key: GroupKey): string {
  return `${filePrefix}_${pairName(key)}.json`;
}

export function serializeGroup<TEntry>(group: AggregateGroup<TEntry>): string {
  const document: AggregateDocument<TEntry> = { meta: group.meta, entries: group.entries };
  return `${JSON.stringify(document, null, 2)}\n`;
}

/**
 * Writes one file per group. A group left without entries gets no file, and
 * an aggregate from an earlier run under the same name is removed.
 */
export async function writeAggregateGroups<TEntry>(
  groups: readonly AggregateGroup<TEntry>[],
  options: WriteAggregatesOptions,
): Promise<WriteAggregatesResult> {
  const result: WriteAggregatesResult = { written: [], skipped: [], failed: [] };

  for (const group of groups) {
    const fileName = aggregateFileName(options.filePrefix, group.key);
    const filePath = path.join(options.outputDir, fileName);

    try {
      if (group.entries.length === 0) {
        await fs.rm(filePath, { force: true });
        result.skipped.push(fileName);
        logger.info({
          event: 'group.empty',
          message: `No entries for ${fileName}; nothing written`,
        });
        continue;
      }

      await fs.mkdir(options.outputDir, { recursive: true });
      await fs.writeFile(filePath, serializeGroup(group), 'utf8');
      result.written.push(filePath);
      logger.info({
        event: 'group.written',
        message: `Saved merged ${options.filePrefix}: ${fileName}`,
        data: { entries: group.entries.length },
      });
    } catch (error) {
      result.failed.push({ fileName, error });
      logger.error({
        event: 'group.write_failed',
        message: `Failed to write ${filePath}`,
        error,
      });
    }
  }

  return result;
}
