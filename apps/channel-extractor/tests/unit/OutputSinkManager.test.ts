/**
 * Unit tests for OutputSinkManager
 */
import { describe, it, expect } from 'vitest';
import path from 'path';
import { OutputSinkManager, assertInsideDir, entryFormat } from '../../src/modules/OutputSinkManager.js';
import { AudioFormat, ChannelPlan } from '../../src/types/index.js';
import { ConfigurationError } from '../../src/utils/errors.js';
import { initLogger } from '../../src/utils/logger.js';
import { createMemorySinks, sinkFor } from '../helpers/fakes.js';

// Initialize logger for tests
initLogger({
  level: 'error',
  format: 'simple',
  toFile: false,
  toConsole: false,
  logsPath: './test-logs',
});

const OUTPUT_DIR = '/virtual/out';

const SOURCE: AudioFormat = {
  encoding: 'pcm',
  sampleRate: 48000,
  bitsPerSample: 24,
  channels: 6,
  blockAlign: 18,
};

describe('OutputSinkManager', () => {
  describe('assertInsideDir', () => {
    it('should accept plain file names', () => {
      expect(() => assertInsideDir(OUTPUT_DIR, 'kick.wav')).not.toThrow();
      expect(() => assertInsideDir(`${OUTPUT_DIR}/`, '..-escaped.wav')).not.toThrow();
    });

    it('should reject names that leave the directory', () => {
      expect(() => assertInsideDir(OUTPUT_DIR, '../x.wav')).toThrow(ConfigurationError);
      expect(() => assertInsideDir(OUTPUT_DIR, 'nested/x.wav')).toThrow(
        `Output name "nested/x.wav" resolves outside ${OUTPUT_DIR}`
      );
      expect(() => assertInsideDir(OUTPUT_DIR, '..')).toThrow(ConfigurationError);
    });
  });

  describe('entryFormat', () => {
    it('should keep rate and depth with one or two channels', () => {
      expect(entryFormat(SOURCE, { kind: 'stereo', name: 'oh', left: 2, right: 3, fileName: 'oh-stereo.wav' })).toEqual({
        encoding: 'pcm', sampleRate: 48000, bitsPerSample: 24, channels: 2, blockAlign: 6,
      });
      expect(entryFormat(SOURCE, { kind: 'mono', name: 'kick', index: 0, fileName: 'kick.wav' }).blockAlign).toBe(3);
    });
  });

  describe('open', () => {
    it('should refuse a file name outside the output directory and close opened sinks', async () => {
      const { factory, sinks, opened } = createMemorySinks();
      const manager = new OutputSinkManager({ outputDir: OUTPUT_DIR, sourceFormat: SOURCE, createSink: factory });
      const plan: ChannelPlan = {
        entries: [
          { kind: 'mono', name: 'kick', index: 0, fileName: 'kick.wav' },
          { kind: 'mono', name: 'escaped', index: 1, fileName: '../escaped.wav' },
        ],
        conflicts: [],
      };

      await expect(manager.open(plan)).rejects.toThrow(ConfigurationError);

      expect(opened).toEqual(['kick.wav']);
      expect(sinkFor(sinks, 'kick.wav').closeCount).toBe(1);
    });

    it('should write to sinks by plan position', async () => {
      const { factory, sinks } = createMemorySinks();
      const manager = new OutputSinkManager({ outputDir: OUTPUT_DIR, sourceFormat: SOURCE, createSink: factory });
      await manager.open({
        entries: [
          { kind: 'mono', name: 'kick', index: 0, fileName: 'kick.wav' },
          { kind: 'mono', name: 'snare', index: 1, fileName: 'snare.wav' },
        ],
        conflicts: [],
      });

      await manager.write(1, Buffer.from([1, 2, 3]));
      await manager.closeAll();
      await manager.closeAll();

      expect(sinkFor(sinks, 'snare.wav').data).toEqual(Buffer.from([1, 2, 3]));
      expect(sinkFor(sinks, 'kick.wav').data).toHaveLength(0);
      expect(sinkFor(sinks, 'kick.wav').closeCount).toBe(1);
      expect(manager.getOutputs().map(output => output.filePath)).toEqual([
        path.join(OUTPUT_DIR, 'kick.wav'),
        path.join(OUTPUT_DIR, 'snare.wav'),
      ]);
      await expect(manager.write(0, Buffer.alloc(3))).rejects.toThrow('No open output for plan entry 0');
    });
  });
});
