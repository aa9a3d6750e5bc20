/**
 * Channel Extractor
 * Streams an interleaved multichannel source into one output per mono channel or stereo pair
 */
import { EventEmitter } from 'events';
import {
  AudioFormat,
  CancellationSignal,
  ChannelPlan,
  ExtraChannelPolicy,
  ExtractionPhase,
  ExtractionProgress,
  ExtractionResult,
  PlanEntry,
  SinkFactory,
  SourceFormat,
  SourceFrameReader,
} from '../types/index.js';
import { ConfigurationError, FormatError, toExtractionError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { DEFAULT_CHUNK_FRAMES } from '../utils/config.js';
import { WavFileReader } from '../services/wav-reader.service.js';
import { createWavSink } from '../services/wav-writer.service.js';
import { buildChannelDescriptors, validateLabelCount } from './ChannelMetadataBuilder.js';
import { detectChannelPlan, sourceChannelsOf } from './StereoPairDetector.js';
import { OutputSinkManager } from './OutputSinkManager.js';
import { ProgressTracker } from './ProgressReporter.js';

let logger: ReturnType<typeof getLogger> | null = null;

/**
 * ChannelExtractor configuration
 */
export interface ChannelExtractorConfig {
  /** Open source reader; not closed by the extractor */
  reader: SourceFrameReader;
  /** One label per source channel */
  labels: readonly string[];
  /** Destination directory */
  outputDir: string;
  /** Opens output sinks (defaults to WAV files) */
  createSink?: SinkFactory;
  /** Frames per chunk */
  chunkFrames?: number;
  /** Handling of source channels without a label */
  extraChannels?: ExtraChannelPolicy;
  /** Checked before every chunk */
  signal?: CancellationSignal;
  /** Clock in milliseconds */
  now?: () => number;
}

/**
 * ChannelExtractor events
 */
export interface ChannelExtractorEvents {
  'phase': (phase: ExtractionPhase) => void;
  'plan': (plan: ChannelPlan) => void;
  'progress': (progress: ExtractionProgress) => void;
}

/**
 * Validate the source format and narrow it to a supported one
 * @throws FormatError
 */
export function validateSourceFormat(format: SourceFormat): AudioFormat {
  if (format.encoding === null) {
    throw new FormatError(
      `Unsupported WAV encoding (format tag 0x${format.formatTag.toString(16).padStart(4, '0')}). ` +
      'Only PCM or IEEE float formats are supported.'
    );
  }

  if (format.channels < 1) {
    throw new FormatError('Source declares no channels');
  }

  if (format.bitsPerSample === 0 || format.bitsPerSample % 8 !== 0) {
    throw new FormatError(`Unsupported bit depth: ${format.bitsPerSample}`);
  }

  const bytesPerSample = format.bitsPerSample / 8;
  if (format.blockAlign !== bytesPerSample * format.channels) {
    throw new FormatError(
      `Block alignment mismatch: ${format.blockAlign} bytes declared, ` +
      `expected ${bytesPerSample * format.channels} (${bytesPerSample} x ${format.channels} channels)`
    );
  }

  return {
    encoding: format.encoding,
    sampleRate: format.sampleRate,
    bitsPerSample: format.bitsPerSample,
    channels: format.channels,
    blockAlign: format.blockAlign,
  };
}

/**
 * Copy the samples of `sourceChannels` out of `framesRead` interleaved frames.
 * Output is interleaved in `sourceChannels` order.
 */
export function relocateSamples(
  input: Buffer,
  framesRead: number,
  blockAlign: number,
  bytesPerSample: number,
  sourceChannels: readonly number[]
): Buffer {
  const outFrameSize = sourceChannels.length * bytesPerSample;
  const output = Buffer.allocUnsafe(framesRead * outFrameSize);

  for (let frame = 0; frame < framesRead; frame++) {
    const frameStart = frame * blockAlign;
    let dst = frame * outFrameSize;
    for (const channel of sourceChannels) {
      const src = frameStart + channel * bytesPerSample;
      input.copy(output, dst, src, src + bytesPerSample);
      dst += bytesPerSample;
    }
  }

  return output;
}

/**
 * Channel extractor
 * One instance performs one run:
 * idle → validating → planning → streaming → completed | cancelled | failed
 */
export class ChannelExtractor extends EventEmitter {
  private config: ChannelExtractorConfig;
  private readonly chunkFrames: number;
  private readonly now: () => number;
  private phase: ExtractionPhase = 'idle';
  private framesProcessed = 0;
  private totalFrames = 0;
  private chunksWritten = 0;

  constructor(config: ChannelExtractorConfig) {
    super();
    this.config = config;
    this.chunkFrames = config.chunkFrames ?? DEFAULT_CHUNK_FRAMES;
    this.now = config.now ?? Date.now;

    if (!Number.isInteger(this.chunkFrames) || this.chunkFrames <= 0) {
      throw new RangeError(`chunkFrames must be a positive integer (got ${this.chunkFrames})`);
    }

    // Lazy initialize logger
    if (!logger) {
      try {
        logger = getLogger().child({ context: 'ChannelExtractor' });
      } catch {
        logger = null;
      }
    }
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', message: string, ...args: unknown[]): void {
    if (logger) {
      logger[level](message, ...args);
    }
  }

  /**
   * Run the extraction. Failures are reported in the result, not thrown.
   */
  async run(): Promise<ExtractionResult> {
    if (this.phase !== 'idle') {
      throw new Error('ChannelExtractor.run() can only be called once');
    }

    const startedAt = this.now();
    let sinks: OutputSinkManager | null = null;
    let outcome: 'completed' | 'cancelled';

    try {
      this.setPhase('validating');
      const format = validateSourceFormat(this.config.reader.format);
      validateLabelCount(this.config.labels, format.channels, this.config.extraChannels ?? 'ignore');
      this.totalFrames = Math.floor(this.config.reader.dataLength / format.blockAlign);

      this.setPhase('planning');
      const plan = detectChannelPlan(buildChannelDescriptors(this.config.labels));
      if (plan.entries.length === 0) {
        throw new ConfigurationError('Every channel is marked unused, nothing to extract');
      }
      this.emit('plan', plan);

      sinks = new OutputSinkManager({
        outputDir: this.config.outputDir,
        sourceFormat: format,
        createSink: this.config.createSink ?? createWavSink,
      });
      await sinks.open(plan);

      this.setPhase('streaming');
      this.log(
        'info',
        `Extracting ${plan.entries.length} output(s) from ${format.channels} channels, ` +
        `${this.totalFrames} frames, ${this.chunkFrames} frames per chunk`
      );
      outcome = await this.stream(format, plan.entries, sinks);

      await sinks.closeAll();
    } catch (error) {
      const failure = toExtractionError(error, 'Extraction failed');
      this.log('error', 'Extraction failed:', failure);

      if (sinks) {
        try {
          await sinks.closeAll();
        } catch (closeError) {
          this.log('error', 'Error closing outputs after failure:', closeError);
        }
      }

      this.setPhase('failed');
      return {
        status: 'failed',
        error: failure,
        ...this.summary(startedAt, sinks),
      };
    }

    if (outcome === 'cancelled') {
      this.log('warn', `Extraction cancelled after ${this.chunksWritten} chunk(s), ${this.framesProcessed} frames`);
    } else {
      this.log('info', `Extraction complete: ${this.framesProcessed} frames`);
    }

    this.setPhase(outcome);
    return { status: outcome, ...this.summary(startedAt, sinks) };
  }

  /**
   * Chunk loop. Cancellation is checked before every read, so an in-flight
   * chunk is always written completely. Bytes of a frame split across reads
   * are carried to the front of the next read; only a partial frame at the
   * end of the stream is dropped.
   */
  private async stream(
    format: AudioFormat,
    entries: readonly PlanEntry[],
    sinks: OutputSinkManager
  ): Promise<'completed' | 'cancelled'> {
    const { reader, signal } = this.config;
    const blockAlign = format.blockAlign;
    const bytesPerSample = format.bitsPerSample / 8;
    const chunkBytes = this.chunkFrames * blockAlign;
    const input = Buffer.alloc(chunkBytes);
    const layouts = entries.map(sourceChannelsOf);
    const tracker = new ProgressTracker(this.totalFrames, this.now);
    let carried = 0;

    for (;;) {
      if (signal?.aborted) {
        return 'cancelled';
      }

      const bytesRead = await reader.read(input.subarray(carried), chunkBytes - carried);
      if (bytesRead === 0) {
        if (carried > 0) {
          this.log('warn', `Dropping ${carried} trailing byte(s) of an incomplete frame`);
        }
        break;
      }

      const available = carried + bytesRead;
      const framesRead = Math.floor(available / blockAlign);
      const frameBytes = framesRead * blockAlign;
      carried = available - frameBytes;
      if (framesRead === 0) {
        continue;
      }

      // Scatter one task per entry over the shared input, gather before writing
      const buffers = await Promise.all(
        layouts.map(async (channels) => relocateSamples(input, framesRead, blockAlign, bytesPerSample, channels))
      );

      if (carried > 0) {
        input.copy(input, 0, frameBytes, available);
      }

      for (const [position, buffer] of buffers.entries()) {
        await sinks.write(position, buffer);
      }

      this.framesProcessed += framesRead;
      this.chunksWritten++;

      const progress = tracker.update(this.framesProcessed);
      if (progress) {
        this.emit('progress', progress);
      }
    }

    // Empty source: report completion once
    if (tracker.lastReportedPercent < 0) {
      const progress = tracker.update(this.framesProcessed);
      if (progress) {
        this.emit('progress', progress);
      }
    }

    return 'completed';
  }

  private summary(startedAt: number, sinks: OutputSinkManager | null) {
    return {
      framesProcessed: this.framesProcessed,
      totalFrames: this.totalFrames,
      elapsedMs: this.now() - startedAt,
      outputs: sinks ? sinks.getOutputs() : [],
    };
  }

  private setPhase(phase: ExtractionPhase): void {
    this.phase = phase;
    this.log('debug', `Phase: ${phase}`);
    this.emit('phase', phase);
  }

  getPhase(): ExtractionPhase {
    return this.phase;
  }

  getChunksWritten(): number {
    return this.chunksWritten;
  }

  // Typed event emitter methods
  on<K extends keyof ChannelExtractorEvents>(
    event: K,
    listener: ChannelExtractorEvents[K]
  ): this {
    return super.on(event, listener);
  }

  emit<K extends keyof ChannelExtractorEvents>(
    event: K,
    ...args: Parameters<ChannelExtractorEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}

/**
 * Options for `extractChannels`
 */
export interface ExtractChannelsOptions {
  chunkFrames?: number;
  extraChannels?: ExtraChannelPolicy;
  signal?: CancellationSignal;
  createSink?: SinkFactory;
  onProgress?: (progress: ExtractionProgress) => void;
  onPlan?: (plan: ChannelPlan) => void;
}

/**
 * Extract the labelled channels of a WAV file into `outputDir`
 */
export async function extractChannels(
  inputPath: string,
  outputDir: string,
  labels: readonly string[],
  options: ExtractChannelsOptions = {}
): Promise<ExtractionResult> {
  let reader: WavFileReader;
  try {
    reader = await WavFileReader.open(inputPath);
  } catch (error) {
    return {
      status: 'failed',
      error: toExtractionError(error, `Cannot open ${inputPath}`),
      framesProcessed: 0,
      totalFrames: 0,
      elapsedMs: 0,
      outputs: [],
    };
  }

  try {
    const extractor = new ChannelExtractor({
      reader,
      labels,
      outputDir,
      createSink: options.createSink,
      chunkFrames: options.chunkFrames,
      extraChannels: options.extraChannels,
      signal: options.signal,
    });

    if (options.onProgress) {
      extractor.on('progress', options.onProgress);
    }
    if (options.onPlan) {
      extractor.on('plan', options.onPlan);
    }

    return await extractor.run();
  } finally {
    await reader.close();
  }
}
