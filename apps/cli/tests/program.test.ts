import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createProgram } from '../src/program.js';
import { runPipeline } from '../src/run.js';
import { createLoggerMock } from './helpers.js';

vi.mock('../src/run.js', () => ({
  runPipeline: vi.fn(),
}));

const runPipelineMock = vi.mocked(runPipeline);

function program() {
  const logger = createLoggerMock();
  return createProgram({ env: { OUTPUT_DIR: 'env-out' }, createLogger: () => logger })
    .exitOverride()
    .configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
}

describe('createProgram', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('passes flags through the configuration to the run', async () => {
    await program().parseAsync(
      ['--input', 'dreams.json', '--parallel', '--max-workers', '3', '--min-content-length', '80'],
      { from: 'user' },
    );

    expect(runPipelineMock).toHaveBeenCalledTimes(1);
    const [config, deps] = runPipelineMock.mock.calls[0]!;
    expect(config).toMatchObject({ parallel: true, maxWorkers: 3, minContentLength: 80, outputDir: 'env-out' });
    expect(deps).toMatchObject({ inputPath: 'dreams.json', benchmark: false });
  });

  it('lets --output-dir override the environment', async () => {
    await program().parseAsync(['--input', 'dreams.json', '--output-dir', 'cli-out', '--benchmark'], { from: 'user' });

    const [config, deps] = runPipelineMock.mock.calls[0]!;
    expect(config.outputDir).toBe('cli-out');
    expect(config.parallel).toBe(false);
    expect(deps.benchmark).toBe(true);
  });

  it('requires --input', async () => {
    await expect(program().parseAsync([], { from: 'user' })).rejects.toMatchObject({
      code: 'commander.missingMandatoryOptionValue',
    });
    expect(runPipelineMock).not.toHaveBeenCalled();
  });

  it('rejects a non-positive worker count', async () => {
    await expect(
      program().parseAsync(['--input', 'dreams.json', '--max-workers', '0'], { from: 'user' }),
    ).rejects.toMatchObject({ code: 'commander.invalidArgument' });
  });

  it('describes --max-workers as a limit on in-flight chunk tasks', () => {
    const option = program().options.find((candidate) => candidate.long === '--max-workers');

    expect(option?.description).toBe(
      'Chunk tasks in flight at once, all on one thread (default: estimated from input size)',
    );
  });
});
