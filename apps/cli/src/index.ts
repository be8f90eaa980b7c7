#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * `packpub` publishes a resource pack to Modrinth, one version per pack format.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { setLogLevel } from '@packpub/utils';

// Commands
import { resolveCommand } from './commands/resolve.js';
import { groupsCommand } from './commands/groups.js';
import { packVersionCommand } from './commands/packVersion.js';
import { updateMcmetaCommand } from './commands/updateMcmeta.js';
import { packageCommand } from './commands/package.js';
import { publishCommand } from './commands/publish.js';
import type { GlobalOptions } from './lib/context.js';

const program = new Command();

program
  .name('packpub')
  .description('Publish a Minecraft resource pack to Modrinth, one version per pack format')
  .version('1.0.0')
  .option('--json', 'Output in JSON format')
  .option('--debug', 'Enable debug logging')
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts<GlobalOptions>().debug) {
      setLogLevel('debug');
    }
  });

// ============================================
// ERROR HANDLING
// ============================================

// Set before the commands are added so they inherit it
program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('packpub --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

// ============================================
// VERSION COMMANDS
// ============================================

program
  .command('resolve')
  .description('Resolve target game versions and write the versions artifact')
  .option('--versions <list>', 'Comma separated game versions')
  .option('--latest <count>', 'Latest N releases')
  .option('--all', 'Every release, grouped by pack format')
  .option('-o, --out <file>', 'Artifact path (default ARTIFACT_PATH)')
  .action(resolveCommand);

program
  .command('groups [file]')
  .description('Print the versions artifact as CI output lines')
  .option('--github-output', 'Also append the lines to $GITHUB_OUTPUT')
  .action(groupsCommand);

program
  .command('pack-version [override]')
  .description('Print the pack version the next publish would use')
  .action(packVersionCommand);

// ============================================
// PACK COMMANDS
// ============================================

program
  .command('update-mcmeta <path> <minecraftVersion> <packFormat> [description]')
  .description('Set pack_format and the auto-update description in pack.mcmeta')
  .action(updateMcmetaCommand);

program
  .command('package')
  .description('Zip pack.mcmeta, pack.png and assets/')
  .option('-d, --pack-dir <dir>', 'Pack directory (default PACK_DIR)')
  .option('-o, --out <file>', 'Archive path (default ARCHIVE_PATH)')
  .action(packageCommand);

// ============================================
// PUBLISH
// ============================================

program
  .command('publish')
  .description('Resolve, update, package and upload one version per pack format')
  .option('--versions <list>', 'Comma separated game versions')
  .option('--latest <count>', 'Latest N releases')
  .option('--all', 'Every release, grouped by pack format')
  .option('--dry-run', 'Resolve and write the artifact only')
  .option('--skip-published', 'Skip groups the project already has up to date')
  .option('--continue-on-upload-failure', 'Upload the remaining groups after a failure')
  .option('--abort-on-upload-failure', 'Stop at the first failed upload')
  .action(publishCommand);

await program.parseAsync();
