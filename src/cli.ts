#!/usr/bin/env node
/**
 * jobstage CLI - composition root
 *
 * Wires dependencies for each command and turns CliResult into an exit
 * status. Command logic lives in src/cli/commands/*.ts.
 */

import { Command } from 'commander';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { ValidatedConfig } from './config/app-config.js';
import type { ILoggerFactory } from './core/logging/index.js';
import { createBootstrapLogger } from './core/logging/index.js';
import type { ChecksumPort } from './staging/ports/checksum.port.js';
import type { TextFilePort } from './staging/ports/text-file.port.js';
import type { ResilientCopier } from './staging/resilient-copy.js';
import { JobSummary } from './pipeline/job-summary.js';
import type { PipelineVariables } from './pipeline/pipeline-variables.js';
import { formatAppError } from './errors/formatter.js';
import { Err } from './errors/factories.js';

import { interpretCliResult, interpretCliResultWithoutDI } from './cli/interpret-result.js';
import type { CliResult } from './cli/types/cli-result.js';
import { failure } from './cli/types/cli-result.js';
import {
  executeCopyCommand,
  executeChecksumCommand,
  executeSummaryCommand,
  executeSetVariableCommand,
} from './cli/commands/index.js';

/**
 * Initialize DI, run `command`, then exit according to its result.
 * Invalid configuration ends the process before the command runs.
 */
async function runWithContainer(command: () => Promise<CliResult>): Promise<void> {
  const initialized = initializeContainer({ runtimeMode: { kind: 'cli' } });
  if (initialized.isErr()) {
    createBootstrapLogger('cli').error({ issues: initialized.error.issues }, initialized.error.message);
    interpretCliResultWithoutDI(failure(formatAppError(initialized.error)));
    return;
  }

  let terminator: ProcessTerminator;
  try {
    terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
  } catch (e) {
    interpretCliResultWithoutDI(failure(formatAppError(Err.startupFailed('dependency wiring', 'Cannot resolve runtime', e))));
    return;
  }

  let result: CliResult;
  try {
    result = await command();
  } catch (e) {
    result = failure(formatAppError(Err.unexpected('Command aborted', e)));
  }
  interpretCliResult(result, terminator);
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('jobstage')
  .description('Stage files for batch jobs and copy them with retries')
  .version('0.3.0');

program
  .command('copy <from> <to>')
  .description('Copy a file with retries, temp-then-rename and size verification')
  .option('-n, --max-attempts <n>', 'Number of copy attempts before giving up')
  .action(async (fromPath: string, toPath: string, options: { maxAttempts?: string }) => {
    await runWithContainer(() => {
      const copier = container.resolve<ResilientCopier>(DI.Staging.Copier);
      return executeCopyCommand(fromPath, toPath, options, {
        copyFile: async (from, to, maxAttempts) => {
          const chosen = maxAttempts === undefined ? copier : copier.withPolicy({ maxAttempts });
          return chosen.copy(from, to);
        },
      });
    });
  });

program
  .command('checksum <file>')
  .description('Print the MD5 digest of a file')
  .action(async (filePath: string) => {
    await runWithContainer(() => {
      const checksum = container.resolve<ChecksumPort>(DI.Infra.Checksum);
      return executeChecksumCommand(filePath, { digestFile: (p) => checksum.digestFile(p) });
    });
  });

program
  .command('summary <key> <value>')
  .description('Append a key/value line to the job summary file')
  .option('-f, --file <path>', 'Summary file (default: $PIPELINE_SUMMARY or ./pipeline_summary)')
  .option('-p, --prefix <prefix>', 'Line prefix (default: "Pipeline.")')
  .action(async (key: string, value: string, options: { file?: string; prefix?: string }) => {
    await runWithContainer(() => {
      const config = container.resolve<ValidatedConfig>(DI.Config.App);
      const textFile = container.resolve<TextFilePort>(DI.Infra.TextFile);
      const logger = container.resolve<ILoggerFactory>(DI.Logging.Factory).create('JobSummary');
      return executeSummaryCommand(key, value, options, {
        createSummary: (file, prefix) =>
          new JobSummary(file ?? config.pipeline.summaryFile, { textFile, logger }, prefix),
      });
    });
  });

program
  .command('set-variable <name> <value>')
  .description('Set a pipeline variable for the current job')
  .action(async (name: string, value: string) => {
    await runWithContainer(() => {
      const variables = container.resolve<PipelineVariables>(DI.Pipeline.Variables);
      return executeSetVariableCommand(name, value, {
        setVariable: (n, v) => variables.setVariable(n, v),
      });
    });
  });

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

await program.parseAsync(process.argv);
