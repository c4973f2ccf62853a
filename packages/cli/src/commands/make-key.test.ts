import { describe, expect, it } from 'vitest';
import { runCommand } from '../test-helpers/run-command.js';
import { makeKey, registerMakeKey } from './make-key.js';

describe('make-key command', () => {
  it('joins words with single spaces before hashing', () => {
    expect(makeKey(['Hello', 'world'])).toBe('5356FD33');
    expect(makeKey(['Hello world'])).toBe('5356FD33');
  });

  it('prints the key', async () => {
    const result = await runCommand(registerMakeKey, ['make-key', 'Saved']);
    expect(result.stdout).toEqual(['7DFAB256']);
    expect(result.exitCode).toBeUndefined();
  });

  it('prints text and key as JSON', async () => {
    const result = await runCommand(registerMakeKey, ['make-key', 'File', 'not', 'found', '--json']);
    expect(JSON.parse(result.stdout[0])).toEqual({ text: 'File not found', key: '972771BC' });
  });
});
