import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadConfig, type ConfigOverrides } from '../src/config.js';
import { InputShapeError } from '../src/io.js';
import { PERFORMANCE_TARGET_SECONDS, runPipeline } from '../src/run.js';
import { createLoggerMock, rawRecords } from './helpers.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'ruya-sft-run-'));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

async function writeInput(data: unknown): Promise<string> {
  const path = join(dir, 'input.json');
  await writeFile(path, JSON.stringify(data));
  return path;
}

function configFor(overrides: ConfigOverrides = {}) {
  return loadConfig({}, { outputDir: join(dir, 'out'), minContentLength: 50, ...overrides });
}

describe('runPipeline', () => {
  it('writes every enabled artifact', async () => {
    const inputPath = await writeInput(rawRecords(3, { shortEvery: 3 }));

    const result = await runPipeline(configFor(), { logger: createLoggerMock(), inputPath });

    expect(result.mode).toBe('sequential');
    expect(result.artifacts.map((a) => a.kind)).toEqual(['processedData', 'chatFormat', 'promptFormat', 'qualityReport']);

    const processed: unknown = JSON.parse(await readFile(join(dir, 'out', 'processed_data.json'), 'utf8'));
    expect(processed).toEqual([
      expect.objectContaining({ original_id: 'id-1', dream_symbol: 'yılan', tags: ['yılan'] }),
      expect.objectContaining({ original_id: 'id-2', dream_symbol: 'yılan', tags: ['yılan'] }),
    ]);

    const chatLines = (await readFile(join(dir, 'out', 'chat_format.jsonl'), 'utf8')).trimEnd().split('\n');
    expect(chatLines).toHaveLength(8);

    const promptLines = (await readFile(join(dir, 'out', 'prompt_format.jsonl'), 'utf8')).trimEnd().split('\n');
    expect(promptLines).toHaveLength(8);

    const report: unknown = JSON.parse(await readFile(join(dir, 'out', 'quality_report.json'), 'utf8'));
    expect(report).toMatchObject({
      processingSummary: {
        processing: { originalRecordCount: 3, processedRecordCount: 2 },
        outputFormats: { chatExamples: 8, promptExamples: 8, formatConsistency: true },
      },
      summary: { totalRecordsAnalyzed: 2 },
    });
  });

  it('uses the chunked path only above the threshold', async () => {
    const small = await runPipeline(configFor({ parallel: true }), {
      logger: createLoggerMock(),
      inputPath: await writeInput(rawRecords(50)),
    });
    expect(small.mode).toBe('sequential');

    const large = await runPipeline(configFor({ parallel: true, maxWorkers: 3 }), {
      logger: createLoggerMock(),
      inputPath: await writeInput(rawRecords(60, { shortEvery: 4 })),
    });
    expect(large.mode).toBe('parallel');
    expect(large.summary.processing.processedRecordCount).toBe(45);
  });

  it('skips disabled artifacts', async () => {
    const inputPath = await writeInput(rawRecords(2));
    const result = await runPipeline(configFor({ saveChatFormat: false, saveProcessedData: false }), {
      logger: createLoggerMock(),
      inputPath,
    });

    expect(result.artifacts.map((a) => a.kind)).toEqual(['promptFormat', 'qualityReport']);
    expect(existsSync(join(dir, 'out', 'chat_format.jsonl'))).toBe(false);
    expect(existsSync(join(dir, 'out', 'processed_data.json'))).toBe(false);
  });

  it('benchmarks a sample when asked', async () => {
    const result = await runPipeline(configFor(), {
      logger: createLoggerMock(),
      inputPath: await writeInput(rawRecords(12)),
      benchmark: true,
    });

    expect(result.benchmark?.sampleSize).toBe(10);
  });

  it('fails before writing anything when the input is not a list', async () => {
    const inputPath = await writeInput({ records: [] });

    await expect(runPipeline(configFor(), { logger: createLoggerMock(), inputPath })).rejects.toBeInstanceOf(
      InputShapeError,
    );
    expect(existsSync(join(dir, 'out'))).toBe(false);
  });

  it('writes an empty report for an empty input', async () => {
    const result = await runPipeline(configFor(), {
      logger: createLoggerMock(),
      inputPath: await writeInput([]),
    });

    expect(result.report.recommendations).toEqual(['No records to analyze']);
    expect(result.summary.processing.dataRetentionRate).toBe(0);
    expect(await readFile(join(dir, 'out', 'chat_format.jsonl'), 'utf8')).toBe('');
  });

  it('reports the performance target as met for a quick run', async () => {
    const logger = createLoggerMock();
    await runPipeline(configFor(), { logger, inputPath: await writeInput(rawRecords(2)) });

    expect(logger.info).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'performance_target', targetSeconds: PERFORMANCE_TARGET_SECONDS, met: true }),
      expect.stringMatching(/^Performance target met: \d+\.\d{2}s$/),
    );
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('warns when a run exceeds the performance target', async () => {
    const logger = createLoggerMock();
    const inputPath = await writeInput(rawRecords(2));
    vi.spyOn(performance, 'now').mockReturnValueOnce(0).mockReturnValue(120_000);

    await runPipeline(configFor(), { logger, inputPath });

    expect(logger.warn).toHaveBeenCalledWith(
      { event: 'performance_target', targetSeconds: 60, durationSeconds: 120, met: false },
      'Performance target missed: 120.00s > 60s',
    );
  });
});
