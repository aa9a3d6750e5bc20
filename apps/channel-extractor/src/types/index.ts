/**
 * Core type definitions for the channel extractor
 */

/**
 * Sample encodings the extractor can relocate
 */
export type SampleEncoding = 'pcm' | 'float';

/**
 * Format of an interleaved source or output stream
 */
export interface AudioFormat {
  /** Sample encoding */
  encoding: SampleEncoding;
  /** Samples per second */
  sampleRate: number;
  /** Bits per sample (per channel) */
  bitsPerSample: number;
  /** Interleaved channel count */
  channels: number;
  /** Bytes per frame */
  blockAlign: number;
}

/**
 * Source format as declared by the container, before validation.
 * `encoding` is null when the format tag is neither PCM nor IEEE float.
 */
export interface SourceFormat extends Omit<AudioFormat, 'encoding'> {
  encoding: SampleEncoding | null;
  /** Raw WAVE format tag (resolved through the sub-format for extensible files) */
  formatTag: number;
}

/**
 * Sequential reader over interleaved frames
 */
export interface SourceFrameReader {
  readonly format: SourceFormat;
  /** Length of the sample data in bytes */
  readonly dataLength: number;
  /**
   * Fill `buffer` from its start with up to `length` bytes.
   * @returns bytes read, 0 at end of stream
   */
  read(buffer: Buffer, length: number): Promise<number>;
  close(): Promise<void>;
}

/**
 * Writable output for one plan entry
 */
export interface OutputSink {
  append(data: Buffer): Promise<void>;
  close(): Promise<void>;
}

/**
 * Opens a sink at `filePath` for the given mono/stereo format
 */
export type SinkFactory = (filePath: string, format: AudioFormat) => Promise<OutputSink>;

/**
 * Cooperative cancellation flag, satisfied by `AbortSignal`
 */
export interface CancellationSignal {
  readonly aborted: boolean;
}

/**
 * One labelled source channel
 */
export interface ChannelDescriptor {
  /** Zero-based position inside an interleaved frame */
  readonly index: number;
  /** Normalized label */
  readonly name: string;
}

/**
 * Pair accumulator used while detecting stereo groups
 */
export interface StereoGroup {
  readonly baseName: string;
  readonly left?: number;
  readonly right?: number;
}

export type StereoSide = 'left' | 'right';

/**
 * A side that was assigned more than once; the later index won
 */
export interface PairConflict {
  baseName: string;
  side: StereoSide;
  replacedIndex: number;
  index: number;
}

export interface StereoPlanEntry {
  kind: 'stereo';
  name: string;
  left: number;
  right: number;
  /** Output file name inside the destination directory */
  fileName: string;
}

export interface MonoPlanEntry {
  kind: 'mono';
  name: string;
  index: number;
  /** Output file name inside the destination directory */
  fileName: string;
}

export type PlanEntry = StereoPlanEntry | MonoPlanEntry;

/**
 * Final partition of the labelled channels
 */
export interface ChannelPlan {
  readonly entries: readonly PlanEntry[];
  readonly conflicts: readonly PairConflict[];
}

/**
 * What to do with source channels that have no label
 */
export type ExtraChannelPolicy = 'ignore' | 'error';

/**
 * Progress snapshot emitted while streaming
 */
export interface ExtractionProgress {
  /** 0..100, non-decreasing over a run */
  percent: number;
  framesProcessed: number;
  totalFrames: number;
  elapsedMs: number;
  /** Absent until at least one frame was processed */
  estimatedRemainingMs?: number;
}

export type ExtractionPhase =
  | 'idle'
  | 'validating'
  | 'planning'
  | 'streaming'
  | 'completed'
  | 'cancelled'
  | 'failed';

/**
 * File written for a plan entry
 */
export interface ExtractionOutput {
  kind: PlanEntry['kind'];
  name: string;
  filePath: string;
  /** Source channel indices, in output channel order */
  sourceChannels: number[];
}

interface ExtractionSummary {
  framesProcessed: number;
  totalFrames: number;
  elapsedMs: number;
  outputs: ExtractionOutput[];
}

export type ExtractionResult =
  | (ExtractionSummary & { status: 'completed' })
  | (ExtractionSummary & { status: 'cancelled' })
  | (ExtractionSummary & { status: 'failed'; error: Error });
