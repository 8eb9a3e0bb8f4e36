import type { Command } from '@oclif/core';
import chalk from 'chalk';

/**
 * Log verbose progress message.
 */
export function logVerbose(command: Command, message: string, verbose: boolean, isJson = false): void {
  if (!isJson && verbose) {
    command.log(chalk.gray(message));
  }
}

/**
 * Log a warning (for both JSON and non-JSON modes).
 */
export function logWarning(command: Command, message: string, isJson = false): void {
  if (isJson) {
    command.log(JSON.stringify({ warning: message }));
  } else {
    command.log(chalk.yellow(message));
  }
}
