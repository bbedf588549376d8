import { describe, it, expect, beforeEach } from 'vitest';
import { PipelineVariables, MAX_VARIABLE_LENGTH } from '../../../src/pipeline/pipeline-variables.js';
import type { PipelineConfig } from '../../../src/config/app-config.js';
import { ScriptedCommandRunner, capturingLogger, silentLogger, LEVEL } from '../../fakes/staging/index.js';

const config: PipelineConfig = {
  summaryFile: './pipeline_summary',
  process: 'recon',
  stream: '17',
  task: 'nightly',
};

describe('PipelineVariables', () => {
  let runner: ScriptedCommandRunner;

  beforeEach(() => {
    runner = new ScriptedCommandRunner();
  });

  it('runs the set helper with name and value as separate arguments', async () => {
    const variables = new PipelineVariables({ runner, config, logger: silentLogger() });

    expect(await variables.setVariable('OUTPUT_FILE', 'run 42.root')).toBe(0);
    expect(runner.calls).toEqual([{ command: 'pipelineSet', args: ['OUTPUT_FILE', 'run 42.root'] }]);
  });

  it('warns about long values but still sends them', async () => {
    const { logger, messages } = capturingLogger();
    const variables = new PipelineVariables({ runner, config, logger });

    await variables.setVariable('LIST', 'x'.repeat(MAX_VARIABLE_LENGTH + 1));

    expect(messages(LEVEL.warn)).toEqual(['Variable is probably too long to work correctly']);
    expect(runner.calls).toHaveLength(1);
  });

  it('returns the helper exit status', async () => {
    runner.respondWith(() => ({ exitCode: 3, stderr: 'no such stream' }));
    const variables = new PipelineVariables({ runner, config, logger: silentLogger() });

    expect(await variables.setVariable('N', 5)).toBe(3);
    expect(runner.calls[0]?.args).toEqual(['N', '5']);
  });

  it('returns 1 when the helper cannot be started', async () => {
    runner.failToSpawn(1);
    const variables = new PipelineVariables({ runner, config, logger: silentLogger() });

    expect(await variables.createSubStream('merge')).toBe(1);
  });

  it('creates sub-streams with the default stream number', async () => {
    const variables = new PipelineVariables({ runner, config, logger: silentLogger() });

    await variables.createSubStream('merge');
    await variables.createSubStream('merge', 4, 'RUN=12');

    expect(runner.commandLines()).toEqual(['pipelineCreateStream merge -1 ', 'pipelineCreateStream merge 4 RUN=12']);
  });

  it('exposes the job identity from configuration', () => {
    const variables = new PipelineVariables({ runner, config, logger: silentLogger() });

    expect([variables.getProcess(), variables.getStream(), variables.getTask()]).toEqual(['recon', '17', 'nightly']);
  });
});
