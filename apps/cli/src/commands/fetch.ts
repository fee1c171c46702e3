/**
 * Fetch Command
 *
 * Pages through a JSON feed and downloads every referenced asset into the
 * output directory, skipping whatever the archive already holds.
 */

import ora from 'ora';
import { z } from 'zod';
import { MediaFetchError } from '@mediafetch/core';
import {
  HttpSession,
  PacingPolicy,
  ProxyRotator,
  RateLimiter,
  RetryingApiCaller,
  withSession,
} from '@mediafetch/network';
import {
  Aria2Client,
  BatchTransferOrchestrator,
  DirectTransferClient,
  DownloadArchive,
  runPipeline,
  type PipelineResult,
} from '@mediafetch/acquisition';
import { ensureDir, errorMessage, formatDuration } from '@mediafetch/utils';
import { loadConfigFile, resolveConfig, type CliConfig } from '../config/index.js';
import { printError, printInfo, printReport, printWarning } from '../lib/output.js';
import { JsonFeedSource } from '../sources/jsonFeed.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export interface FetchOptions {
  output?: string;
  archive?: string;
  limit?: string;
  proxy?: string;
  proxyFile?: string;
  cookie?: string;
  aria2: boolean;
  batchSize?: string;
  concurrency?: string;
  quiet?: boolean;
}

const positiveInt = z.coerce.number().int().positive().optional();

const numericOptionsSchema = z.object({
  limit: positiveInt,
  batchSize: positiveInt,
  concurrency: positiveInt,
});

export function exitCodeFor(result: PipelineResult): number {
  if (result.report.interrupted) {
    return EXIT_INTERRUPTED;
  }
  if (result.error || result.report.failed > 0) {
    return EXIT_FAILURE;
  }
  return EXIT_OK;
}

export async function fetchCommand(feedUrl: string, options: FetchOptions): Promise<void> {
  const feed = z.string().url().safeParse(feedUrl);
  if (!feed.success) {
    printError(`Not a valid feed URL: ${feedUrl}`);
    process.exit(EXIT_FAILURE);
  }
  const feedUrlValue = feed.data;

  const numbers = numericOptionsSchema.safeParse(options);
  if (!numbers.success) {
    const issue = numbers.error.issues[0];
    printError(`Invalid --${issue?.path.join('.') ?? 'option'}: ${issue?.message ?? 'expected a positive integer'}`);
    process.exit(EXIT_FAILURE);
  }
  const { limit, batchSize, concurrency } = numbers.data;

  let config: CliConfig;
  try {
    config = resolveConfig(
      {
        output: options.output,
        archive: options.archive,
        proxy: options.proxy,
        proxyFile: options.proxyFile,
        cookie: options.cookie,
        aria2: options.aria2,
        batchSize,
        concurrency,
      },
      process.env,
      await loadConfigFile()
    );
  } catch (error) {
    printError(errorMessage(error));
    process.exit(EXIT_FAILURE);
  }

  const { settings } = config;
  const quiet = options.quiet ?? false;

  if (config.proxyDisabled && !quiet) {
    printWarning('Proxy disabled while a cookie is in use');
  }

  const proxies = await ProxyRotator.create({
    proxy: config.proxy,
    proxyFile: config.proxyFile,
    rotateEvery: settings.proxy.rotateEvery,
    shuffle: settings.proxy.shuffle,
  });
  if (!quiet) {
    for (const warning of proxies.warnings) {
      printWarning(`Proxy: ${warning}`);
    }
  }

  await ensureDir(config.outputDir);
  const archive = config.archive ? await DownloadArchive.open(config.archive) : new DownloadArchive();
  if (archive.enabled && !quiet) {
    printInfo(`Using archive: ${archive.path} (${archive.size} entries)`);
  }

  const spinner = ora({ text: 'Fetching feed...', isSilent: quiet }).start();

  const limiter = new RateLimiter(settings.rateLimit);
  const caller = new RetryingApiCaller(limiter, proxies, {
    ...settings.retry,
    onRetry: event => {
      spinner.text = `${event.endpoint}: retry ${event.attempt + 2}/${event.maxAttempts} in ${formatDuration(event.waitMs)}`;
    },
  });
  const session = new HttpSession(proxies, {
    headers: config.cookie ? { cookie: config.cookie } : {},
    timeoutMs: settings.transfer.timeoutMs,
  });
  const direct = new DirectTransferClient({
    maxAttempts: settings.transfer.directAttempts,
    timeoutMs: settings.transfer.timeoutMs,
  });
  const agent = config.aria2.enabled
    ? new Aria2Client({ host: config.aria2.host, port: config.aria2.port, secret: config.aria2.secret })
    : null;
  const orchestrator = new BatchTransferOrchestrator({
    archive,
    direct,
    agent,
    proxies,
    batchSize: settings.transfer.batchSize,
    concurrency: settings.transfer.concurrency,
  });

  let downloaded = 0;
  orchestrator.on('batch:start', batch => {
    spinner.text = `Downloading batch ${batch.index + 1} (${batch.items.length} files)...`;
  });
  orchestrator.on('item:success', () => {
    downloaded++;
  });
  orchestrator.on('batch:complete', summary => {
    spinner.text = `Downloaded ${downloaded} files via ${summary.via}, fetching feed...`;
  });

  const controller = new AbortController();
  const onSigint = (): void => {
    if (controller.signal.aborted) {
      process.exit(EXIT_INTERRUPTED);
    }
    spinner.warn('Interrupted, finishing current transfers (Ctrl+C again to quit now)');
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  let result: PipelineResult;
  try {
    result = await withSession(session, () =>
      runPipeline(new JsonFeedSource(session, feedUrlValue, config.outputDir), caller, orchestrator, {
        limit,
        batchSize: settings.transfer.batchSize,
        pacing: new PacingPolicy(settings.pacing),
        signal: controller.signal,
      })
    );
  } finally {
    process.off('SIGINT', onSigint);
    await direct.close();
  }

  if (result.error) {
    spinner.fail(
      result.error instanceof MediaFetchError ? result.error.message : `Unexpected error: ${result.error.message}`
    );
  } else if (result.report.interrupted) {
    spinner.warn('Stopped before finishing');
  } else {
    spinner.succeed(`Processed ${result.itemsSeen} feed items`);
  }

  if (!quiet) {
    printReport(result.report);
  }

  process.exitCode = exitCodeFor(result);
}
