import type { GroupKey } from './aggregator';

export class BatchFormatError extends Error {
  readonly sourcePath: string;

  constructor(sourcePath: string, reason: string, options?: { cause?: unknown }) {
    super(`Invalid batch file ${sourcePath}: ${reason}`, options);
    this.name = 'BatchFormatError';
    this.sourcePath = sourcePath;
  }
}

export class MissingKeyError extends Error {
  readonly sourcePath: string | null;
  readonly key: string;

  constructor(key: string, sourcePath: string | null) {
    const location = sourcePath ? ` in ${sourcePath}` : '';
    super(`Batch meta is missing required key "${key}"${location}`);
    this.name = 'MissingKeyError';
    this.key = key;
    this.sourcePath = sourcePath;
  }
}

export class EntryNormalizationError extends Error {
  readonly issues: string[];

  constructor(kind: string, issues: string[]) {
    super(`Malformed ${kind}: ${issues.join('; ')}`);
    this.name = 'EntryNormalizationError';
    this.issues = issues;
  }
}

/** Two distinct language pairs that would be written to the same file. */
export class GroupNameCollisionError extends Error {
  readonly fileStem: string;
  readonly sourcePath: string | null;

  constructor(fileStem: string, existing: GroupKey, incoming: GroupKey, sourcePath: string | null) {
    const location = sourcePath ? ` in ${sourcePath}` : '';
    super(
      `Language pair (${incoming.lang}, ${incoming.secondaryLang})${location} collides with ` +
        `(${existing.lang}, ${existing.secondaryLang}) on ${fileStem}.json`,
    );
    this.name = 'GroupNameCollisionError';
    this.fileStem = fileStem;
    this.sourcePath = sourcePath;
  }
}
