import chalk from 'chalk';
import type { Command } from 'commander';
import {
  createLanguageServer,
  hashKey,
  silentLogger,
  type LanguageServerOptions,
  type LingoConfig,
} from '@lingolayer/core';
import { loadCliConfig } from '../utils/config.js';
import { withErrorHandling } from '../utils/errors.js';

interface AddStringOptions {
  config?: string;
  language?: string;
}

export interface AddStringResult {
  key: string;
  filePath: string;
}

/**
 * Writes one runtime translation into `runtime.<ext>` of a language,
 * creating the folder and the file when needed. `overrides` win over the
 * config, `language` among them.
 */
export function addRuntimeString(
  config: LingoConfig,
  text: string,
  translation: string,
  overrides: LanguageServerOptions = {}
): AddStringResult {
  const server = createLanguageServer(config, {
    ...overrides,
    createIfMissing: true,
    logger: silentLogger,
  });
  try {
    server.addRuntimeString(text, translation);
    return { key: hashKey(text), filePath: server.runtimeStringsPath ?? '' };
  } finally {
    server.dispose();
  }
}

export function registerAddString(program: Command) {
  program
    .command('add-string <text> <translation>')
    .description('Store a runtime string translation for a language')
    .option('-c, --config <path>', 'Path to lingolayer config file')
    .option('-l, --language <language>', 'Target language folder (defaults to the configured language)')
    .action(
      withErrorHandling(async (text: string, translation: string, options: AddStringOptions) => {
        const { config } = await loadCliConfig(options.config);
        const result = addRuntimeString(
          config,
          text,
          translation,
          options.language ? { language: options.language } : {}
        );
        console.log(chalk.green(`✓ ${result.key} = ${translation}`));
        console.log(chalk.dim(`  Updated: ${result.filePath}`));
      })
    );
}
