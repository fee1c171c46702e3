/**
 * Config Command
 * 
 * Create the config file or show the effective configuration.
 */

import chalk from 'chalk';
import { errorMessage } from '@mediafetch/utils';
import {
  CONFIG_FILE,
  loadConfigFile,
  resolveConfig,
  writeDefaultConfig,
  type CliConfig,
} from '../config/index.js';
import {
  maskSecret,
  printError,
  printHeader,
  printInfo,
  printJson,
  printKeyValue,
  printSuccess,
} from '../lib/output.js';

interface ConfigInitOptions {
  force?: boolean;
}

interface ConfigShowOptions {
  json?: boolean;
}

export async function configInitCommand(options: ConfigInitOptions): Promise<void> {
  const written = await writeDefaultConfig(CONFIG_FILE, options.force ?? false);
  if (!written) {
    printInfo(`Config file already exists: ${CONFIG_FILE}`);
    console.log(chalk.gray('Use --force to overwrite it with defaults'));
    return;
  }
  printSuccess(`Created ${CONFIG_FILE}`);
}

/**
 * Config with secrets masked, fit for printing
 */
export function redactConfig(config: CliConfig): CliConfig {
  return {
    ...config,
    cookie: config.cookie ? maskSecret(config.cookie) : undefined,
    aria2: { ...config.aria2, secret: config.aria2.secret ? maskSecret(config.aria2.secret) : '' },
  };
}

export async function configShowCommand(options: ConfigShowOptions): Promise<void> {
  let config: CliConfig;
  try {
    config = redactConfig(resolveConfig({}, process.env, await loadConfigFile()));
  } catch (error) {
    printError(errorMessage(error));
    process.exit(1);
  }

  if (options.json) {
    printJson(config);
    return;
  }

  printHeader('Configuration');
  printKeyValue('Config file', CONFIG_FILE);
  printKeyValue('Output dir', config.outputDir);
  printKeyValue('Archive', config.archive ?? chalk.gray('disabled'));
  printKeyValue('Proxy', config.proxy ?? config.proxyFile ?? chalk.gray('direct'));
  printKeyValue('Cookie', config.cookie ?? chalk.gray('not set'));
  printKeyValue(
    'aria2',
    config.aria2.enabled ? `${config.aria2.host}:${config.aria2.port}` : chalk.gray('disabled')
  );

  const { rateLimit, retry, transfer } = config.settings;
  printHeader('Limits');
  printKeyValue('Rate window', `${rateLimit.maxRequests} requests / ${rateLimit.windowMs / 1000}s`);
  printKeyValue('Retries', `${retry.maxAttempts} attempts, backoff cap ${retry.maxBackoffMs / 1000}s`);
  printKeyValue('Batch size', transfer.batchSize);
  printKeyValue('Concurrency', transfer.concurrency);
}
