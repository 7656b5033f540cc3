#!/usr/bin/env node
import { Command } from 'commander';
import { createInitCommand } from './commands/init.js';
import { createServeCommand } from './commands/serve.js';
import { createAddCommand } from './commands/add.js';
import { createSearchCommand } from './commands/search.js';
import { formatCliError } from './utils/validation.js';
import { APP_NAME, APP_VERSION } from '../constants.js';

const program = new Command();

program
  .name(APP_NAME)
  .description('Retrieval-augmented chat backend with local-first model routing')
  .version(APP_VERSION);

program.addCommand(createInitCommand());
program.addCommand(createServeCommand());
program.addCommand(createAddCommand());
program.addCommand(createSearchCommand());

program.parseAsync().catch((error: unknown) => {
  console.error(formatCliError(error));
  process.exit(1);
});
