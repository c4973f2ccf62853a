import type { Command } from 'commander';
import { hashKey } from '@lingolayer/core';
import { withErrorHandling } from '../utils/errors.js';

interface MakeKeyOptions {
  json?: boolean;
}

/**
 * Key of a runtime string as it appears in the `Strings` table. Words given
 * as separate arguments are joined with single spaces.
 */
export function makeKey(words: string[]): string {
  return hashKey(words.join(' '));
}

export function registerMakeKey(program: Command) {
  program
    .command('make-key <text...>')
    .description('Print the translation key of a runtime string')
    .option('--json', 'Output as JSON', false)
    .action(
      withErrorHandling((words: string[], options: MakeKeyOptions) => {
        const text = words.join(' ');
        const key = makeKey(words);
        if (options.json) {
          console.log(JSON.stringify({ text, key }, null, 2));
          return;
        }
        console.log(key);
      })
    );
}
