import { describe, it, expect, beforeEach } from 'vitest';
import { JobSummary } from '../../../src/pipeline/job-summary.js';
import { InMemoryTextFile, capturingLogger, silentLogger, LEVEL } from '../../fakes/staging/index.js';

describe('JobSummary', () => {
  let textFile: InMemoryTextFile;

  beforeEach(() => {
    textFile = new InMemoryTextFile();
  });

  it('appends prefixed key/value lines', async () => {
    const summary = new JobSummary('/work/pipeline_summary', { textFile, logger: silentLogger() });
    summary.add('EventsProcessed', 41669);
    summary.add('Site', 'scratch-a');

    expect(await summary.write()).toBe(0);
    expect(textFile.files.get('/work/pipeline_summary')).toBe(
      'Pipeline.EventsProcessed: 41669\nPipeline.Site: scratch-a\n'
    );
  });

  it('appends to what an earlier write left', async () => {
    textFile.files.set('/work/summary', 'Pipeline.First: 1\n');
    const summary = new JobSummary('/work/summary', { textFile, logger: silentLogger() }, '');
    summary.add('Second', 2);

    await summary.write();

    expect(textFile.files.get('/work/summary')).toBe('Pipeline.First: 1\nSecond: 2\n');
  });

  it('lists buffered lines in the dump', () => {
    const summary = new JobSummary('out.txt', { textFile, logger: silentLogger() });
    summary.add('A', 1);

    expect(summary.dump()).toBe(
      [
        'Dump of current user summary data:',
        'Summary filename = out.txt',
        'Summary item prefix = Pipeline.',
        'There are 1 items in the Summary list.',
        '',
        '----------begin summary----------',
        'Pipeline.A: 1',
        '----------end summary----------',
      ].join('\n')
    );
  });

  it('returns 1 and logs when the file cannot be written', async () => {
    const { logger, messages } = capturingLogger();
    textFile.failWrites();
    const summary = new JobSummary('/ro/summary', { textFile, logger });
    summary.add('A', 1);

    expect(await summary.write()).toBe(1);
    expect(messages(LEVEL.error)).toEqual(['Could not write job summary']);
  });
});
