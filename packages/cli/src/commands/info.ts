import chalk from 'chalk';
import type { Command } from 'commander';
import { readLanguageInfo, type LanguageInfo } from '@lingolayer/core';
import { loadCliConfig } from '../utils/config.js';
import { CliError, withErrorHandling } from '../utils/errors.js';

interface InfoOptions {
  config?: string;
  json?: boolean;
}

export function describeLanguage(info: LanguageInfo): string[] {
  return [
    `Id:            ${info.id}`,
    `Name:          ${info.name}`,
    `Native name:   ${info.nativeName}`,
    `Right to left: ${info.isRightToLeft ? 'yes' : 'no'}`,
    `UI font:       ${info.uiFont || '-'}`,
    `Fallback font: ${info.fallbackFont || '-'}`,
  ];
}

export function registerInfo(program: Command) {
  program
    .command('info [language]')
    .description('Show the metadata of a language (defaults to the configured language)')
    .option('-c, --config <path>', 'Path to lingolayer config file')
    .option('--json', 'Output as JSON', false)
    .action(
      withErrorHandling(async (language: string | undefined, options: InfoOptions) => {
        const { config } = await loadCliConfig(options.config);
        const target = language ?? config.language;
        const info = readLanguageInfo(config.rootPath, target, config.format);

        if (!info.id && !info.name) {
          throw new CliError(`No metadata found for language "${target}" in ${config.rootPath}`);
        }

        if (options.json) {
          console.log(JSON.stringify(info, null, 2));
          return;
        }
        console.log(chalk.bold(target));
        for (const line of describeLanguage(info)) {
          console.log(`  ${line}`);
        }
      })
    );
}
