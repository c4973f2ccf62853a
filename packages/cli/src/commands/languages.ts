import chalk from 'chalk';
import type { Command } from 'commander';
import { listLanguages, type LanguageCatalogEntry } from '@lingolayer/core';
import { loadCliConfig } from '../utils/config.js';
import { withErrorHandling } from '../utils/errors.js';

interface LanguagesOptions {
  config?: string;
  json?: boolean;
}

export function formatLanguageLine(entry: LanguageCatalogEntry, current: string): string {
  const { info } = entry;
  const marker = entry.folder === current ? '*' : ' ';
  const names = [info.name, info.nativeName && info.nativeName !== info.name ? `(${info.nativeName})` : '']
    .filter(Boolean)
    .join(' ');
  const direction = info.isRightToLeft ? ' [rtl]' : '';
  return `${marker} ${info.id.padEnd(8)} ${names}${direction}`.trimEnd();
}

export function registerLanguages(program: Command) {
  program
    .command('languages')
    .description('List the languages found under the languages folder')
    .option('-c, --config <path>', 'Path to lingolayer config file')
    .option('--json', 'Output as JSON', false)
    .action(
      withErrorHandling(async (options: LanguagesOptions) => {
        const { config } = await loadCliConfig(options.config);
        const entries = await listLanguages(config.rootPath, config.format);

        if (options.json) {
          console.log(JSON.stringify(entries, null, 2));
          return;
        }

        if (!entries.length) {
          console.log(chalk.yellow(`No languages found in ${config.rootPath}`));
          return;
        }

        console.log(chalk.bold(`Languages in ${config.rootPath}:`));
        for (const entry of entries) {
          const line = formatLanguageLine(entry, config.language);
          console.log(entry.folder === config.language ? chalk.green(line) : line);
        }
      })
    );
}
