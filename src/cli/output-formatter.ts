/**
 * CLI Output Formatter
 *
 * Turns CliResult into styled text with chalk. Results go to stdout,
 * failures to stderr; pino logs share stderr.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';

export function formatOutput(output: CliOutput, isError: boolean = false): string {
  const lines: string[] = [];

  lines.push(isError ? chalk.red(`✗ ${output.message}`) : chalk.green(output.message));

  if (output.details && output.details.length > 0) {
    output.details.forEach((detail) => {
      lines.push(chalk.white(`  ${detail}`));
    });
  }

  if (output.warnings && output.warnings.length > 0) {
    lines.push(chalk.yellow('Warnings:'));
    output.warnings.forEach((warning) => {
      lines.push(chalk.yellow(`  • ${warning}`));
    });
  }

  if (output.suggestions && output.suggestions.length > 0) {
    output.suggestions.forEach((suggestion) => {
      lines.push(chalk.gray(`  hint: ${suggestion}`));
    });
  }

  return lines.join('\n');
}

export function formatResult(result: CliResult): string {
  switch (result.kind) {
    case 'success':
      return result.output ? formatOutput(result.output, false) : '';

    case 'failure':
      return formatOutput(result.output, true);
  }
}

export function printResult(result: CliResult): void {
  const formatted = formatResult(result);
  if (!formatted) return;

  if (result.kind === 'failure') {
    console.error(formatted);
  } else {
    console.log(formatted);
  }
}
