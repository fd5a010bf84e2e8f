import { describe, it, expect } from 'vitest';
import { parseArgs } from '../../cli/args.js';
import { UsageError } from '../../utils/errors.js';

describe('parseArgs', () => {
  it('joins positional arguments with spaces', () => {
    expect(parseArgs(['need', 'to', 'buy', 'milk'])).toEqual({
      help: false,
      title: 'need to buy milk',
    });
  });

  it('keeps a quoted argument intact', () => {
    expect(parseArgs(["I've to do something"]).title).toBe("I've to do something");
  });

  it('returns an empty title when no arguments are given', () => {
    expect(parseArgs([])).toEqual({ help: false, title: '' });
  });

  it.each(['-h', '-help', '--help'])('recognises %s', (flag) => {
    expect(parseArgs([flag]).help).toBe(true);
  });

  it('stops reading flags at the first positional argument', () => {
    expect(parseArgs(['call', '-5', 'people', '-h'])).toEqual({
      help: false,
      title: 'call -5 people -h',
    });
  });

  it('treats everything after -- as positional', () => {
    expect(parseArgs(['--', '-h', 'later'])).toEqual({ help: false, title: '-h later' });
  });

  it('rejects unknown flags', () => {
    expect(() => parseArgs(['--verbose', 'x'])).toThrow(UsageError);
    expect(() => parseArgs(['--verbose', 'x'])).toThrow('flag provided but not defined: --verbose');
  });
});
