#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import fs from 'fs-extra';
import * as path from 'path';
import { logger } from './utils/cli/logger';
import { formatHelp, displayError } from './utils/cli/cli-display';
import { commitCommand, markCommittedCommand } from './commands';

const pkg: { version: string } = fs.readJsonSync(path.join(__dirname, '../package.json'));

const collect = (value: string, previous: string[]): string[] => [...previous, value];

const program = new Command();

program
  .name('revcommit')
  .description('Commit accepted review revisions to a Subversion working copy')
  .version(pkg.version, '-v, --version', 'Display version information')
  .option('-V, --verbose', 'Enable verbose logging')
  .option('-q, --quiet', 'Suppress output')
  .option('--config-file <path>', 'Use this user config file instead of the default')
  .option('-c, --config <key=value>', 'Override a configuration value', collect, [])
  .option('--service-uri <uri>', 'Review service URI')
  .configureHelp({
    formatHelp: (cmd) => formatHelp(cmd),
  })
  .hook('preAction', (thisCommand) => {
    const options = thisCommand.opts();

    if (options['quiet']) {
      logger.level = 'silent';
    } else if (options['verbose']) {
      logger.level = 'debug';
    }
  });

program.addCommand(commitCommand);
program.addCommand(markCommittedCommand);

program.exitOverride();

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof CommanderError) {
    const quietExits = ['commander.version', 'commander.help', 'commander.helpDisplayed'];
    process.exit(quietExits.includes(err.code) ? 0 : err.exitCode);
  }

  displayError(err instanceof Error ? err : new Error(String(err)));
  process.exit(1);
});
