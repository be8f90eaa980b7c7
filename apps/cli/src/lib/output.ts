/**
 * Output Formatter
 *
 * Consistent CLI output formatting. Human output goes to stdout; `--json`
 * switches commands to a single JSON document instead.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { describeError, PublisherError } from '@packpub/core';

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
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

/**
 * Spinner on stderr; silent when the command prints JSON
 */
export function spinner(text: string, json: boolean): Ora {
  return ora({ text, isSilent: json }).start();
}

/**
 * Print a failure naming its stage and set the exit code it carries
 */
export function fail(error: unknown, json: boolean): void {
  const message = describeError(error);
  if (json) {
    printJson({ ok: false, error: message });
  } else {
    printError(message);
  }
  process.exitCode = error instanceof PublisherError ? error.exitCode : 1;
}
