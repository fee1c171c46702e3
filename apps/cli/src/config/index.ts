/**
 * CLI Configuration
 *
 * Precedence: command-line flags, then environment (.env included),
 * then ~/.mediafetch/config.json, then built-in defaults.
 */

import { z } from 'zod';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { settingsSchema, ValidationError, type Settings } from '@mediafetch/core';
import { safeReadFile, safeWriteFile } from '@mediafetch/utils';

// Config file location
export const CONFIG_DIR = join(homedir(), '.mediafetch');
export const CONFIG_FILE = join(CONFIG_DIR, 'config.json');

// Environment schema
const envSchema = z.object({
  MEDIAFETCH_OUTPUT_DIR: z.string().min(1).optional(),
  MEDIAFETCH_ARCHIVE: z.string().min(1).optional(),
  MEDIAFETCH_PROXY: z.string().min(1).optional(),
  MEDIAFETCH_PROXY_FILE: z.string().min(1).optional(),
  MEDIAFETCH_COOKIE: z.string().min(1).optional(),
  MEDIAFETCH_ARIA2: z.enum(['true', 'false']).optional(),
  ARIA2_HOST: z.string().min(1).optional(),
  ARIA2_PORT: z.coerce.number().int().min(1).max(65535).optional(),
  ARIA2_SECRET: z.string().optional(),
});

// Config file schema
export const configFileSchema = z.object({
  outputDir: z.string().min(1).default('downloads'),
  archive: z.string().min(1).optional(),
  /** Keep an archive in archiveDir (or outputDir) when --archive is not given */
  autoArchive: z.boolean().default(true),
  archiveDir: z.string().min(1).optional(),
  proxy: z.string().min(1).optional(),
  proxyFile: z.string().min(1).optional(),
  cookie: z.string().min(1).optional(),
  aria2: z.object({
    enabled: z.boolean().default(true),
    host: z.string().min(1).default('localhost'),
    port: z.number().int().min(1).max(65535).default(6800),
    secret: z.string().default(''),
  }).default({}),
  settings: settingsSchema.default({}),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface CliFlags {
  output?: string;
  archive?: string;
  proxy?: string;
  proxyFile?: string;
  cookie?: string;
  /** false when --no-aria2 was passed */
  aria2?: boolean;
  batchSize?: number;
  concurrency?: number;
}

export interface CliConfig {
  outputDir: string;
  /** Archive file, or null for an in-memory archive */
  archive: string | null;
  proxy?: string;
  proxyFile?: string;
  cookie?: string;
  /** A proxy was configured but dropped because a cookie is in use */
  proxyDisabled: boolean;
  aria2: {
    enabled: boolean;
    host: string;
    port: number;
    secret: string;
  };
  settings: Settings;
}

function describeIssue(error: z.ZodError): { field: string; message: string } {
  const issue = error.issues[0];
  return {
    field: issue && issue.path.length > 0 ? issue.path.join('.') : 'config',
    message: issue?.message ?? 'invalid value',
  };
}

/**
 * Parse config file contents. Missing file means all defaults.
 */
export function parseConfigFile(content: string | null, source: string = CONFIG_FILE): ConfigFile {
  if (content === null) {
    return configFileSchema.parse({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(source, `not valid JSON (${error instanceof Error ? error.message : String(error)})`);
  }

  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    const { field, message } = describeIssue(result.error);
    throw new ValidationError(`${source}: ${field}`, message);
  }
  return result.data;
}

export async function loadConfigFile(path: string = CONFIG_FILE): Promise<ConfigFile> {
  return parseConfigFile(await safeReadFile(path), path);
}

/**
 * Merge flags, environment and file into the effective configuration
 */
export function resolveConfig(
  flags: CliFlags,
  environment: NodeJS.ProcessEnv,
  file: ConfigFile
): CliConfig {
  const envResult = envSchema.safeParse(environment);
  if (!envResult.success) {
    const { field, message } = describeIssue(envResult.error);
    throw new ValidationError(field, message);
  }
  const env = envResult.data;

  const outputDir = resolve(flags.output ?? env.MEDIAFETCH_OUTPUT_DIR ?? file.outputDir);
  const explicitArchive = flags.archive ?? env.MEDIAFETCH_ARCHIVE ?? file.archive;
  const archive = explicitArchive
    ? resolve(explicitArchive)
    : file.autoArchive
      ? join(resolve(file.archiveDir ?? outputDir), 'archive.txt')
      : null;

  const cookie = flags.cookie ?? env.MEDIAFETCH_COOKIE ?? file.cookie;
  const proxy = flags.proxy ?? env.MEDIAFETCH_PROXY ?? file.proxy;
  const proxyFile = flags.proxyFile ?? env.MEDIAFETCH_PROXY_FILE ?? file.proxyFile;
  // A logged-in session must keep one stable egress
  const proxyDisabled = cookie !== undefined && (proxy !== undefined || proxyFile !== undefined);

  const aria2Enabled =
    flags.aria2 === false ? false : env.MEDIAFETCH_ARIA2 ? env.MEDIAFETCH_ARIA2 === 'true' : file.aria2.enabled;

  const settingsResult = settingsSchema.safeParse({
    ...file.settings,
    transfer: {
      ...file.settings.transfer,
      ...(flags.batchSize !== undefined ? { batchSize: flags.batchSize } : {}),
      ...(flags.concurrency !== undefined ? { concurrency: flags.concurrency } : {}),
    },
  });
  if (!settingsResult.success) {
    const { field, message } = describeIssue(settingsResult.error);
    throw new ValidationError(field, message);
  }

  return {
    outputDir,
    archive,
    cookie,
    proxy: cookie ? undefined : proxy,
    proxyFile: cookie ? undefined : proxyFile,
    proxyDisabled,
    aria2: {
      enabled: aria2Enabled,
      host: env.ARIA2_HOST ?? file.aria2.host,
      port: env.ARIA2_PORT ?? file.aria2.port,
      secret: env.ARIA2_SECRET ?? file.aria2.secret,
    },
    settings: settingsResult.data,
  };
}

/**
 * Write a config file holding every default. Returns false when one exists
 * and `force` is not set.
 */
export async function writeDefaultConfig(path: string = CONFIG_FILE, force = false): Promise<boolean> {
  if (!force && (await safeReadFile(path)) !== null) {
    return false;
  }
  await safeWriteFile(path, `${JSON.stringify(configFileSchema.parse({}), null, 2)}\n`);
  return true;
}
