#!/usr/bin/env node
import { Command } from 'commander';
import { registerMakeKey } from './commands/make-key.js';
import { registerEscape } from './commands/escape.js';
import { registerLanguages } from './commands/languages.js';
import { registerInfo } from './commands/info.js';
import { registerAddString } from './commands/add-string.js';

export const program = new Command();

program
  .name('lingolayer')
  .description('Inspect and edit runtime language files')
  .version('0.1.0');

registerMakeKey(program);
registerEscape(program);
registerLanguages(program);
registerInfo(program);
registerAddString(program);

program.parse();
