#!/usr/bin/env node
import { Command } from 'commander';
import { APP_NAME, DISPLAY_NAME } from './config/branding.js';
import {
  registerReport,
  registerRemove,
  registerConfig,
  registerVersion,
} from './commands/index.js';

const program = new Command()
  .name(APP_NAME)
  .description(
    `${DISPLAY_NAME} reports on what a Munki repository actually uses and removes\n` +
      'pkginfos and installers while keeping manifests consistent.',
  )
  .showHelpAfterError(true);

registerVersion(program);
registerReport(program);
registerRemove(program);
registerConfig(program);

await program.parseAsync();
