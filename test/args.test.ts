import { describe, expect, it } from 'vitest';
import { InputError } from '../src/errors';
import { getArg, getFlag, getIntArg, positionalText } from '../src/utils/args';

const argv = ['Grand', 'Blanc', 'MI', '--limit', '5', '--debug', '--json=out/sales.json', '48439'];

describe('command line helpers', () => {
  it('reads values in both --name value and --name=value form', () => {
    expect(getArg(argv, 'limit')).toBe('5');
    expect(getArg(argv, 'json')).toBe('out/sales.json');
    expect(getArg(argv, 'txt')).toBeUndefined();
  });

  it('detects switches', () => {
    expect(getFlag(argv, 'debug')).toBe(true);
    expect(getFlag(argv, 'help', '-h')).toBe(false);
    expect(getFlag(['-h'], 'help', '-h')).toBe(true);
  });

  it('joins positional words and skips flag values', () => {
    expect(positionalText(argv)).toBe('Grand Blanc MI 48439');
  });

  it('parses positive integers', () => {
    expect(getIntArg(argv, 'limit')).toBe(5);
    expect(getIntArg(argv, 'max-pages')).toBeUndefined();
    expect(() => getIntArg(['--limit', '0'], 'limit')).toThrow(InputError);
    expect(() => getIntArg(['--limit', 'ten'], 'limit')).toThrow(InputError);
  });
});
