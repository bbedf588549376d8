import type { Logger } from '../core/logging/index.js';
import type { TextFilePort } from '../staging/ports/text-file.port.js';

export const DEFAULT_SUMMARY_PREFIX = 'Pipeline.';

export interface JobSummaryDeps {
  readonly textFile: TextFilePort;
  readonly logger: Logger;
}

/**
 * Key/value results a job reports back to the pipeline server.
 *
 * Lines are buffered by `add` and appended to the summary file by `write`:
 *
 *   Pipeline.EventsProcessed: 41669
 *   Pipeline.TimeElapsed: 493829746
 *
 * Pass an empty prefix for summary files read by other tools.
 */
export class JobSummary {
  private readonly lines: string[] = [];

  constructor(
    readonly filename: string,
    private readonly deps: JobSummaryDeps,
    readonly prefix: string = DEFAULT_SUMMARY_PREFIX
  ) {}

  get numItems(): number {
    return this.lines.length;
  }

  add(key: string, value: string | number): void {
    this.lines.push(`${this.prefix}${key}: ${value}\n`);
  }

  /** Human-readable listing of the buffered lines. */
  dump(): string {
    return [
      'Dump of current user summary data:',
      `Summary filename = ${this.filename}`,
      `Summary item prefix = ${this.prefix}`,
      `There are ${this.numItems} items in the Summary list.`,
      '',
      '----------begin summary----------',
      ...this.lines.map((line) => line.trim()),
      '----------end summary----------',
    ].join('\n');
  }

  /** Append buffered lines to the summary file. 0 on success, 1 on failure. */
  async write(): Promise<number> {
    this.deps.logger.debug({ filename: this.filename, numItems: this.numItems }, 'Writing job summary');

    const written = await this.deps.textFile.appendText(this.filename, this.lines.join(''));
    if (written.isErr()) {
      this.deps.logger.error({ filename: this.filename, reason: written.error.message }, 'Could not write job summary');
      return 1;
    }
    return 0;
  }
}
