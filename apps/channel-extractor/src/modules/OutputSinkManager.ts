/**
 * Output Sink Manager
 * Owns one output sink per plan entry for the lifetime of a run
 */
import path from 'path';
import {
  AudioFormat,
  ChannelPlan,
  ExtractionOutput,
  OutputSink,
  PlanEntry,
  SinkFactory,
} from '../types/index.js';
import { ConfigurationError, IOError, toExtractionError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { sourceChannelsOf } from './StereoPairDetector.js';

let logger: ReturnType<typeof getLogger> | null = null;

/**
 * OutputSinkManager configuration
 */
export interface OutputSinkManagerConfig {
  /** Destination directory */
  outputDir: string;
  /** Source format; outputs keep its rate, bit depth and encoding */
  sourceFormat: AudioFormat;
  /** Opens one sink */
  createSink: SinkFactory;
}

/**
 * Mono/stereo format for an entry, derived from the source
 */
export function entryFormat(source: AudioFormat, entry: PlanEntry): AudioFormat {
  const channels = entry.kind === 'stereo' ? 2 : 1;
  const bytesPerSample = source.bitsPerSample / 8;
  return {
    encoding: source.encoding,
    sampleRate: source.sampleRate,
    bitsPerSample: source.bitsPerSample,
    channels,
    blockAlign: bytesPerSample * channels,
  };
}

/**
 * @throws ConfigurationError if `fileName` would land outside `outputDir`
 */
export function assertInsideDir(outputDir: string, fileName: string): void {
  const root = path.resolve(outputDir);
  if (path.dirname(path.resolve(root, fileName)) !== root) {
    throw new ConfigurationError(`Output name "${fileName}" resolves outside ${outputDir}`);
  }
}

/**
 * Opens, writes and closes the sinks of a plan.
 * Sinks are addressed by plan entry position.
 */
export class OutputSinkManager {
  private config: OutputSinkManagerConfig;
  private sinks: OutputSink[] = [];
  private outputs: ExtractionOutput[] = [];
  private closed = false;

  constructor(config: OutputSinkManagerConfig) {
    this.config = config;

    // Lazy initialize logger
    if (!logger) {
      try {
        logger = getLogger().child({ context: 'OutputSinkManager' });
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
   * Open one sink per entry, in plan order.
   * If any sink fails to open, the ones already opened are closed and the error is rethrown.
   */
  async open(plan: ChannelPlan): Promise<void> {
    if (this.sinks.length > 0 || this.closed) {
      throw new Error('OutputSinkManager.open() can only be called once');
    }

    for (const entry of plan.entries) {
      const filePath = path.join(this.config.outputDir, entry.fileName);
      const format = entryFormat(this.config.sourceFormat, entry);

      try {
        assertInsideDir(this.config.outputDir, entry.fileName);
        this.sinks.push(await this.config.createSink(filePath, format));
      } catch (error) {
        this.log('error', `Failed to open output ${filePath}:`, error);
        try {
          await this.closeAll();
        } catch (closeError) {
          this.log('error', 'Error closing outputs after open failure:', closeError);
        }
        throw toExtractionError(error, `Cannot open output ${filePath}`);
      }

      this.outputs.push({
        kind: entry.kind,
        name: entry.name,
        filePath,
        sourceChannels: sourceChannelsOf(entry),
      });
      this.log('debug', `Opened ${entry.kind} output ${filePath}`);
    }

    this.log('info', `Opened ${this.sinks.length} output file(s) in ${this.config.outputDir}`);
  }

  /**
   * Append a buffer to the sink of plan entry `position`
   */
  async write(position: number, data: Buffer): Promise<void> {
    const sink = this.sinks[position];
    if (this.closed || sink === undefined) {
      throw new Error(`No open output for plan entry ${position}`);
    }
    await sink.append(data);
  }

  /**
   * Close every sink exactly once, even if some closes fail.
   * @throws IOError after all sinks were attempted, if any close failed
   */
  async closeAll(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const failures: Error[] = [];
    for (const [position, sink] of this.sinks.entries()) {
      try {
        await sink.close();
      } catch (error) {
        const output = this.outputs[position];
        this.log('error', `Failed to close output ${output?.filePath ?? position}:`, error);
        failures.push(error instanceof Error ? error : new Error(String(error)));
      }
    }

    this.log('debug', `Closed ${this.sinks.length - failures.length}/${this.sinks.length} output(s)`);

    if (failures.length > 0) {
      throw new IOError(
        `Failed to close ${failures.length} output file(s)`,
        { cause: failures.length === 1 ? failures[0] : new AggregateError(failures) }
      );
    }
  }

  getOutputs(): ExtractionOutput[] {
    return [...this.outputs];
  }
}
