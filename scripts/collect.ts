import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { isSkippedEntryLoggingEnabled, resolveDataDir } from './config';
import { parseCollectOptions } from './collect/options';
import { collectLexicalData, type CollectDomainResult } from './collect/pipeline';
import { createLogger } from './logger';
import { createInterruptSignal, EXIT_INTERRUPTED } from './utils/graceful-exit';

const logger = createLogger('collect');

export async function runCollect(
  argv: readonly string[],
  signal?: AbortSignal,
): Promise<CollectDomainResult[]> {
  const options = parseCollectOptions(argv);
  const dataDir = options.dataDir ? path.resolve(options.dataDir) : resolveDataDir();
  const outputDir = options.outputDir ? path.resolve(options.outputDir) : undefined;
  const logSkippedEntries = isSkippedEntryLoggingEnabled();

  const results: CollectDomainResult[] = [];
  for (const domain of options.domains) {
    const result = await collectLexicalData({
      domain,
      dataDir,
      outputDir,
      signal,
      logSkippedEntries,
    });
    results.push(result);
    if (result.cancelled) {
      break;
    }
  }
  return results;
}

async function main(): Promise<void> {
  const interrupt = createInterruptSignal({
    message: 'Process interrupted. Saving collected data...',
  });

  try {
    const results = await runCollect(process.argv.slice(2), interrupt.signal);
    for (const result of results) {
      logger.line(
        `${result.domain}: ${result.batches} batch(es), ${result.entries} entries, ` +
          `${result.write.written.length} file(s) written, ${result.write.failed.length} failed`,
      );
    }
    if (results.some((result) => result.cancelled)) {
      process.exitCode = EXIT_INTERRUPTED;
    }
  } finally {
    interrupt.dispose();
  }
}

const executedDirectly = fileURLToPath(import.meta.url) === path.resolve(process.argv[1] ?? '');

if (executedDirectly) {
  main().catch((error) => {
    logger.failure(error);
    process.exitCode = 1;
  });
}

export { EXIT_INTERRUPTED, main };
