import fs from 'node:fs/promises';
import path from 'node:path';

import fg from 'fast-glob';

import { createLogger } from '../logger';

const logger = createLogger('release');

export const RELEASE_CATEGORIES = ['dictionaries', 'freqlists', 'phrasebooks', 'wordlists'] as const;

export type ReleaseCategory = (typeof RELEASE_CATEGORIES)[number];

export interface AssembleReleaseOptions {
  dataDir: string;
  releaseDir: string;
  categories?: readonly ReleaseCategory[];
}

export type ReleaseManifest = Record<ReleaseCategory, string[]>;

export async function cleanRelease(releaseDir: string): Promise<void> {
  await fs.rm(releaseDir, { recursive: true, force: true });
  await fs.mkdir(releaseDir, { recursive: true });
}

/**
 * Rebuilds the release tree from every category's `processed_data` folder.
 * Nested files are flattened into `<releaseDir>/<category>/`.
 */
export async function assembleRelease(options: AssembleReleaseOptions): Promise<ReleaseManifest> {
  const categories = options.categories ?? RELEASE_CATEGORIES;
  const manifest: ReleaseManifest = {
    dictionaries: [],
    freqlists: [],
    phrasebooks: [],
    wordlists: [],
  };

  await cleanRelease(options.releaseDir);

  for (const category of categories) {
    const sourceDir = path.join(options.dataDir, category, 'processed_data');
    const targetDir = path.join(options.releaseDir, category);
    await fs.mkdir(targetDir, { recursive: true });

    const files = (await fg('**/*', { cwd: sourceDir, onlyFiles: true })).sort();
    for (const relativePath of files) {
      const fileName = path.basename(relativePath);
      await fs.copyFile(path.join(sourceDir, relativePath), path.join(targetDir, fileName));
      manifest[category].push(fileName);
      logger.info({
        event: 'release.collected',
        message: `Collected ${relativePath} to ${targetDir}`,
      });
    }
  }

  return manifest;
}
