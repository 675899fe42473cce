#!/usr/bin/env node
import { Command } from 'commander';
import { BINDERY_VERSION } from '@bindery/shared';
import { serveCommand } from '../src/commands/serve.js';
import { sourcesCommand } from '../src/commands/sources.js';
import { configCommand } from '../src/commands/config.js';

const program = new Command();

program
  .name('bindery')
  .description('Bindery - source extension server for manga readers')
  .version(BINDERY_VERSION);

program.addCommand(serveCommand);
program.addCommand(sourcesCommand);
program.addCommand(configCommand);

await program.parseAsync();
