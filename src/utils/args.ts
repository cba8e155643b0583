import { InputError } from '../errors';

/** Flags that take a value; anything else starting with -- is a switch. */
const VALUE_FLAGS = new Set(['limit', 'max-pages', 'json', 'txt', 'rss', 'template']);

export function getArg(argv: string[], name: string, alias?: string): string | undefined {
  const i = argv.findIndex((a) => a === `--${name}` || (alias && a === alias));
  if (i >= 0 && i + 1 < argv.length) return argv[i + 1];
  const kv = argv.find((a) => a.startsWith(`--${name}=`));
  if (kv) return kv.slice(name.length + 3);
  return undefined;
}

export function getFlag(argv: string[], name: string, alias?: string): boolean {
  return argv.some((a) => a === `--${name}` || (alias && a === alias));
}

/** Words that are not flags or flag values, joined with single spaces. */
export function positionalText(argv: string[]): string {
  const words: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a.startsWith('-')) {
      const name = a.replace(/^-+/, '');
      if (VALUE_FLAGS.has(name)) i++;
      continue;
    }
    words.push(a);
  }
  return words.join(' ').trim();
}

export function getIntArg(argv: string[], name: string): number | undefined {
  const raw = getArg(argv, name);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) throw new InputError(`--${name} expects a positive integer, got '${raw}'`);
  return n;
}
