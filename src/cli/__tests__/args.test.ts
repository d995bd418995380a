import { describe, test, expect } from 'vitest';
import { DEFAULT_SAMPLE_SIZE, parseArgs } from '../args.js';

describe('parseArgs', () => {
  test('defaults to a full update', () => {
    expect(parseArgs([])).toEqual({ mode: 'update', dryRun: false, sampleSize: undefined, help: false });
  });

  test('selects test mode by flag or positional word', () => {
    expect(parseArgs(['--mode=test']).mode).toBe('test');
    expect(parseArgs(['test']).mode).toBe('test');
  });

  test('reads sample size and dry run', () => {
    expect(parseArgs(['--sample=25', '--dry-run'])).toEqual({
      mode: 'update',
      dryRun: true,
      sampleSize: 25,
      help: false,
    });
    expect(parseArgs(['--sample']).sampleSize).toBe(DEFAULT_SAMPLE_SIZE);
  });

  test('rejects unknown modes and bad sample sizes', () => {
    expect(() => parseArgs(['--mode=full'])).toThrow('Unknown mode "full" (expected update or test)');
    expect(() => parseArgs(['--sample=0'])).toThrow('--sample must be a positive integer, got "0"');
  });

  test('recognizes --help', () => {
    expect(parseArgs(['--help']).help).toBe(true);
  });
});
