import path from "node:path";

const TRUE_VALUES = new Set(["1", "true", "yes", "y", "on", "enabled"]);
const FALSE_VALUES = new Set(["0", "false", "no", "n", "off", "disabled"]);

const DEFAULT_FETCH_TIMEOUT_MS = 10_000;
const DEFAULT_FETCH_USER_AGENT = "LexiconCollect/0.1 (dictionary data aggregation)";

export function parseBooleanFlag(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === null) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (!normalized) {
    return defaultValue;
  }

  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }
  return defaultValue;
}

export function parsePositiveInteger(value: string | undefined, defaultValue: number): number {
  if (value === undefined) {
    return defaultValue;
  }

  const parsed = Number.parseInt(value.trim(), 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return defaultValue;
  }
  return parsed;
}

function resolveDirectory(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return path.resolve(process.cwd(), trimmed ? trimmed : fallback);
}

export function resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
  return resolveDirectory(env.LEXICON_DATA_DIR, "data");
}

export function resolveReleaseDir(env: NodeJS.ProcessEnv = process.env): string {
  return resolveDirectory(env.LEXICON_RELEASE_DIR, "release");
}

/**
 * Skipped entries are always counted in the batch summary; this only controls
 * whether each one gets its own warning line.
 */
export function isSkippedEntryLoggingEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return parseBooleanFlag(env.LEXICON_LOG_SKIPPED_ENTRIES, true);
}

export interface FetchConfig {
  timeoutMs: number;
  userAgent: string;
}

export function getFetchConfig(env: NodeJS.ProcessEnv = process.env): FetchConfig {
  return {
    timeoutMs: parsePositiveInteger(env.LEXICON_FETCH_TIMEOUT_MS, DEFAULT_FETCH_TIMEOUT_MS),
    userAgent: env.LEXICON_FETCH_USER_AGENT?.trim() || DEFAULT_FETCH_USER_AGENT,
  } satisfies FetchConfig;
}
