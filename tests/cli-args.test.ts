import { describe, it, expect } from 'vitest';
import { parseArgs } from '../src/cli-args.js';

describe('parseArgs', () => {
  it('should read the theorem name and description', () => {
    expect(parseArgs(['Pythagorean Theorem', 'a^2 + b^2 = c^2'])).toEqual({
      theoremName: 'Pythagorean Theorem',
      theoremDescription: 'a^2 + b^2 = c^2',
    });
  });

  it('should default the description to empty', () => {
    expect(parseArgs(['Fermat'])).toEqual({ theoremName: 'Fermat', theoremDescription: '' });
  });

  it('should accept --config in either form', () => {
    expect(parseArgs(['--config', 'a.json', 'Fermat']).configPath).toBe('a.json');
    expect(parseArgs(['Fermat', '--config=b.json']).configPath).toBe('b.json');
  });

  it('should reject a bare --config', () => {
    expect(() => parseArgs(['Fermat', '--config'])).toThrow('--config needs a path');
  });

  it('should reject unknown options', () => {
    expect(() => parseArgs(['Fermat', '--fast'])).toThrow('Unknown option --fast');
  });

  it('should print usage without a theorem or with extra arguments', () => {
    expect(() => parseArgs([])).toThrow(/^Usage: theorem-video/);
    expect(() => parseArgs(['a', 'b', 'c'])).toThrow(/^Usage: theorem-video/);
  });
});
