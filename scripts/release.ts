import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { resolveDataDir, resolveReleaseDir } from './config';
import { createLogger } from './logger';
import { assembleRelease } from './release/assemble';

const logger = createLogger('release');

export interface ReleaseOptions {
  dataDir?: string;
  releaseDir?: string;
}

export function parseReleaseOptions(argv: readonly string[]): ReleaseOptions {
  const options: ReleaseOptions = {};

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (!arg || arg === '--') continue;

    if (arg.startsWith('--data-dir=')) {
      options.dataDir = arg.slice('--data-dir='.length) || undefined;
      continue;
    }
    if (arg === '--data-dir') {
      options.dataDir = argv[index + 1];
      index += 1;
      continue;
    }
    if (arg.startsWith('--release-dir=')) {
      options.releaseDir = arg.slice('--release-dir='.length) || undefined;
      continue;
    }
    if (arg === '--release-dir') {
      options.releaseDir = argv[index + 1];
      index += 1;
      continue;
    }
    throw new Error(`Unknown option ${arg}`);
  }

  return options;
}

async function main(): Promise<void> {
  const options = parseReleaseOptions(process.argv.slice(2));
  const dataDir = options.dataDir ? path.resolve(options.dataDir) : resolveDataDir();
  const releaseDir = options.releaseDir ? path.resolve(options.releaseDir) : resolveReleaseDir();

  const manifest = await assembleRelease({ dataDir, releaseDir });
  for (const [category, files] of Object.entries(manifest)) {
    logger.line(`${category}: ${files.length} file(s)`);
  }
  logger.line(`Release data is ready in ${releaseDir}`);
}

const executedDirectly = fileURLToPath(import.meta.url) === path.resolve(process.argv[1] ?? '');

if (executedDirectly) {
  main().catch((error) => {
    logger.failure(error);
    process.exitCode = 1;
  });
}

export { main };
