import type { Command } from 'commander';
import { escapeValue, joinMultiline, restoreMultiline, unescapeValue } from '@lingolayer/core';
import { withErrorHandling } from '../utils/errors.js';

export interface EscapeOptions {
  /** Use the `~~` line folding of INI values instead of bracket tokens. */
  multiline?: boolean;
  decode?: boolean;
}

/**
 * Interprets `\n` and `\r` typed on the command line as line breaks.
 */
export function expandLineBreaks(text: string): string {
  return text.replace(/\\r\\n|\\n|\\r/g, (match) => (match === '\\r\\n' ? '\r\n' : match === '\\n' ? '\n' : '\r'));
}

export function convertText(text: string, options: EscapeOptions = {}): string {
  if (options.multiline) {
    return options.decode ? restoreMultiline(text) : joinMultiline(text);
  }
  return options.decode ? unescapeValue(text) : escapeValue(text);
}

export function registerEscape(program: Command) {
  program
    .command('escape <text>')
    .description('Encode a value the way language files store it (\\n and \\r are read as line breaks)')
    .option('-m, --multiline', 'Fold line breaks into ~~ as INI values do', false)
    .option('-d, --decode', 'Decode instead of encode', false)
    .action(
      withErrorHandling((text: string, options: EscapeOptions) => {
        const input = options.decode ? text : expandLineBreaks(text);
        console.log(convertText(input, options));
      })
    );
}
