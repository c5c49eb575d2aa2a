import fs from 'node:fs/promises';

import fg from 'fast-glob';

import { batchSchema, formatSchemaIssues, type Batch } from '@shared/lexical-schemas';

import { BatchFormatError } from './errors';

/** One source directory, then its `parsed` folder, then any JSON document. */
export const PARSED_BATCH_PATTERN = '*/parsed/*.json';

export interface LoadedBatch {
  path: string;
  batch: Batch;
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export async function discoverBatchFiles(domainDir: string): Promise<string[]> {
  const matches = await fg(PARSED_BATCH_PATTERN, {
    cwd: domainDir,
    absolute: true,
    onlyFiles: true,
  });
  // fast-glob returns files in traversal order; sort so re-runs produce identical output.
  return matches.sort(compareCodeUnits);
}

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

export async function readBatch(filePath: string): Promise<Batch> {
  let content: string;
  try {
    const buffer = await fs.readFile(filePath);
    content = utf8Decoder.decode(buffer);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new BatchFormatError(filePath, `unable to read UTF-8 content (${message})`, {
      cause: error,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new BatchFormatError(filePath, `invalid JSON (${message})`, { cause: error });
  }

  const parsed = batchSchema.safeParse(data);
  if (!parsed.success) {
    throw new BatchFormatError(filePath, formatSchemaIssues(parsed.error.issues).join('; '));
  }

  return parsed.data;
}

export async function* readBatches(domainDir: string): AsyncGenerator<LoadedBatch> {
  const files = await discoverBatchFiles(domainDir);
  for (const filePath of files) {
    yield { path: filePath, batch: await readBatch(filePath) };
  }
}
