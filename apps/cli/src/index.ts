#!/usr/bin/env tsx
/**
 * CLI Entry Point
 * 
 * Command-line interface for mediafetch.
 */

import { resolve } from 'node:path';
import { config as dotenvConfig } from 'dotenv';
import { Command } from 'commander';
import chalk from 'chalk';
import { setLogLevel } from '@mediafetch/utils';

// Commands
import { fetchCommand } from './commands/fetch.js';
import { configInitCommand, configShowCommand } from './commands/config.js';
import { archiveCommand } from './commands/archive.js';

dotenvConfig({ path: resolve(process.cwd(), '.env') });

const program = new Command();

program
  .name('mediafetch')
  .description('Rate-limited feed downloader with a persistent archive')
  .version('1.0.0')
  .option('--debug', 'Enable debug logging')
  .hook('preAction', command => {
    const { debug } = command.opts<{ debug?: boolean }>();
    setLogLevel(debug ? 'debug' : process.env.LOG_LEVEL ?? 'warn');
  });

// ============================================
// DOWNLOAD COMMANDS
// ============================================

program
  .command('fetch <feed-url>')
  .description('Download every asset referenced by a paginated JSON feed')
  .option('-o, --output <dir>', 'Output directory')
  .option('-a, --archive <file>', 'Archive file of already downloaded ids')
  .option('-n, --limit <count>', 'Stop after this many feed items')
  .option('--proxy <url>', 'Single proxy (http, https, socks5)')
  .option('--proxy-file <file>', 'File with one proxy per line, rotated')
  .option('--cookie <value>', 'Cookie header for feed requests (disables proxy)')
  .option('--no-aria2', 'Never hand batches to aria2')
  .option('--batch-size <count>', 'Files per transfer batch')
  .option('--concurrency <count>', 'Parallel downloads within a batch')
  .option('-q, --quiet', 'Only print errors')
  .action(fetchCommand);

program
  .command('archive <file>')
  .description('Show the number of entries in an archive file')
  .action(archiveCommand);

// ============================================
// CONFIG COMMANDS
// ============================================

const config = program
  .command('config')
  .description('Manage the configuration file');

config
  .command('init')
  .description('Write a config file with default values')
  .option('-f, --force', 'Overwrite an existing file')
  .action(configInitCommand);

config
  .command('show')
  .description('Print the effective configuration')
  .option('--json', 'Output in JSON format')
  .action(configShowCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('mediafetch --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

// Parse and execute
program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('✗'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
