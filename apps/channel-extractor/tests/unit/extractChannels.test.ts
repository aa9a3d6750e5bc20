/**
 * End-to-end tests for extractChannels on real WAV files
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { extractChannels } from '../../src/modules/ChannelExtractor.js';
import { ChannelPlan, ExtractionProgress } from '../../src/types/index.js';
import { WavFileReader } from '../../src/services/wav-reader.service.js';
import { WavFileWriter } from '../../src/services/wav-writer.service.js';
import { IOError } from '../../src/utils/errors.js';
import { initLogger } from '../../src/utils/logger.js';
import { expectedPcm16, interleavedPcm16 } from '../helpers/fakes.js';

// Initialize logger for tests
initLogger({
  level: 'error',
  format: 'simple',
  toFile: false,
  toConsole: false,
  logsPath: './test-logs',
});

async function writeSource(filePath: string, channels: number, frames: number): Promise<void> {
  const writer = await WavFileWriter.create(filePath, {
    encoding: 'pcm',
    sampleRate: 48000,
    bitsPerSample: 16,
    channels,
    blockAlign: channels * 2,
  });
  await writer.append(interleavedPcm16(channels, frames));
  await writer.close();
}

async function readSamples(filePath: string): Promise<{ channels: number; data: Buffer }> {
  const reader = await WavFileReader.open(filePath);
  try {
    const data = Buffer.alloc(reader.dataLength);
    await reader.read(data, data.length);
    return { channels: reader.format.channels, data };
  } finally {
    await reader.close();
  }
}

describe('extractChannels', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'channel-extractor-e2e-'));
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  it('should write one WAV file per mono channel and stereo pair', async () => {
    const inputPath = path.join(tempDir, 'session.wav');
    const outputDir = path.join(tempDir, 'session_extracted');
    await writeSource(inputPath, 5, 300);

    const progress: ExtractionProgress[] = [];
    const plans: ChannelPlan[] = [];
    const result = await extractChannels(
      inputPath,
      outputDir,
      ['Kick', 'Snare', 'OH (L)', 'OH (R)', '(unused)'],
      {
        chunkFrames: 64,
        onProgress: (update) => progress.push(update),
        onPlan: (plan) => plans.push(plan),
      }
    );

    expect(result.status).toBe('completed');
    expect(result.framesProcessed).toBe(300);
    expect(result.outputs.map(output => output.filePath)).toEqual([
      path.join(outputDir, 'oh-stereo.wav'),
      path.join(outputDir, 'kick.wav'),
      path.join(outputDir, 'snare.wav'),
    ]);
    expect((await fs.readdir(outputDir)).sort()).toEqual(['kick.wav', 'oh-stereo.wav', 'snare.wav']);

    expect(await readSamples(path.join(outputDir, 'oh-stereo.wav'))).toEqual({
      channels: 2,
      data: expectedPcm16([2, 3], 300),
    });
    expect(await readSamples(path.join(outputDir, 'kick.wav'))).toEqual({
      channels: 1,
      data: expectedPcm16([0], 300),
    });
    expect(await readSamples(path.join(outputDir, 'snare.wav'))).toEqual({
      channels: 1,
      data: expectedPcm16([1], 300),
    });

    expect(plans).toHaveLength(1);
    expect(plans[0].entries.map(entry => entry.fileName)).toEqual(['oh-stereo.wav', 'kick.wav', 'snare.wav']);
    expect(progress[progress.length - 1].percent).toBe(100);
  });

  it('should not write outside the output directory for labels with path segments', async () => {
    const inputPath = path.join(tempDir, 'session.wav');
    const outputDir = path.join(tempDir, 'out');
    await writeSource(inputPath, 2, 20);

    const result = await extractChannels(inputPath, outputDir, ['../escaped', 'Snare']);

    expect(result.status).toBe('completed');
    expect((await fs.readdir(tempDir)).sort()).toEqual(['out', 'session.wav']);
    expect((await fs.readdir(outputDir)).sort()).toEqual(['..-escaped.wav', 'snare.wav']);
  });

  it('should report a missing input file as a failed result', async () => {
    const inputPath = path.join(tempDir, 'missing.wav');

    const result = await extractChannels(inputPath, path.join(tempDir, 'out'), ['Kick', 'Snare']);

    expect(result.status).toBe('failed');
    if (result.status === 'failed') {
      expect(result.error).toBeInstanceOf(IOError);
      expect(result.error.message).toContain(`Cannot open ${inputPath}`);
    }
    expect(result.outputs).toEqual([]);
    expect(await fs.pathExists(path.join(tempDir, 'out'))).toBe(false);
  });

  it('should leave valid empty outputs when cancelled before the first chunk', async () => {
    const inputPath = path.join(tempDir, 'stems.wav');
    const outputDir = path.join(tempDir, 'stems_extracted');
    await writeSource(inputPath, 2, 50);

    const controller = new AbortController();
    controller.abort();

    const result = await extractChannels(inputPath, outputDir, ['Amb L', 'Amb R'], {
      signal: controller.signal,
    });

    expect(result.status).toBe('cancelled');
    expect(result.framesProcessed).toBe(0);
    expect(await readSamples(path.join(outputDir, 'amb-stereo.wav'))).toEqual({
      channels: 2,
      data: Buffer.alloc(0),
    });
  });
});
