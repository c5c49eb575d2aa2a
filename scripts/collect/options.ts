import type { LexicalDomain } from '@shared/lexical';

export interface CollectOptions {
  domains: LexicalDomain[];
  dataDir?: string;
  outputDir?: string;
}

const DOMAIN_ALIASES = new Map<string, LexicalDomain[]>([
  ['all', ['dictionary', 'phrasebook']],
  ['dictionaries', ['dictionary']],
  ['dictionary', ['dictionary']],
  ['phrasebooks', ['phrasebook']],
  ['phrasebook', ['phrasebook']],
]);

function readFlagValue(
  argv: readonly string[],
  index: number,
  flag: string,
): { value: string | undefined; consumed: number } {
  const raw = argv[index];
  if (raw === undefined) {
    return { value: undefined, consumed: 0 };
  }
  if (raw.startsWith(`${flag}=`)) {
    return { value: raw.slice(flag.length + 1) || undefined, consumed: 0 };
  }
  return { value: argv[index + 1], consumed: 1 };
}

export function parseCollectOptions(argv: readonly string[]): CollectOptions {
  const domains = new Set<LexicalDomain>();
  let dataDir: string | undefined;
  let outputDir: string | undefined;

  for (let index = 0; index < argv.length; index += 1) {
    const raw = argv[index];
    if (!raw || raw === '--') {
      continue;
    }

    if (raw === '--data-dir' || raw.startsWith('--data-dir=')) {
      const { value, consumed } = readFlagValue(argv, index, '--data-dir');
      dataDir = value;
      index += consumed;
      continue;
    }

    if (raw === '--out' || raw === '-o' || raw.startsWith('--out=')) {
      const { value, consumed } = readFlagValue(argv, index, '--out');
      outputDir = value;
      index += consumed;
      continue;
    }

    if (raw.startsWith('-')) {
      throw new Error(`Unknown option ${raw}`);
    }

    const selected = DOMAIN_ALIASES.get(raw.toLowerCase());
    if (!selected) {
      throw new Error(`Unknown domain "${raw}". Expected dictionaries, phrasebooks or all.`);
    }
    for (const domain of selected) {
      domains.add(domain);
    }
  }

  return {
    domains: domains.size ? Array.from(domains) : ['dictionary', 'phrasebook'],
    dataDir,
    outputDir,
  } satisfies CollectOptions;
}
