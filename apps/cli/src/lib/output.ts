/**
 * Output Formatter
 * 
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import type { TransferReport } from '@mediafetch/core';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${value}`);
}

/**
 * Keep only the ends of a secret visible
 */
export function maskSecret(value: string | undefined): string {
  if (!value) {
    return 'not set';
  }
  return value.length <= 8 ? '****' : `${value.slice(0, 2)}****${value.slice(-2)}`;
}

export function printReport(report: TransferReport): void {
  printHeader('Summary');
  printKeyValue('Downloaded', chalk.green(report.succeeded));
  printKeyValue('Skipped', report.skipped);
  printKeyValue('Failed', report.failed > 0 ? chalk.red(report.failed) : report.failed);
  if (report.pending > 0) {
    printKeyValue('Pending', chalk.yellow(report.pending));
  }
  for (const failure of report.failures.slice(0, 10)) {
    console.log(`  ${chalk.red('✗')} ${failure.id}: ${chalk.gray(failure.reason)}`);
  }
  if (report.failures.length > 10) {
    console.log(chalk.gray(`  ... and ${report.failures.length - 10} more`));
  }
}
