/**
 * WAV file reader
 * Parses the RIFF/WAVE header and streams the data chunk sequentially
 */
import fs from 'fs-extra';
import { SampleEncoding, SourceFormat, SourceFrameReader } from '../types/index.js';
import { FormatError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

let logger: ReturnType<typeof getLogger> | null = null;

export const WAVE_FORMAT_PCM = 0x0001;
export const WAVE_FORMAT_IEEE_FLOAT = 0x0003;
export const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

const RIFF_HEADER_SIZE = 12;
const CHUNK_HEADER_SIZE = 8;
const MIN_FMT_SIZE = 16;
const EXTENSIBLE_FMT_SIZE = 40;

export function encodingForFormatTag(formatTag: number): SampleEncoding | null {
  switch (formatTag) {
    case WAVE_FORMAT_PCM:
      return 'pcm';
    case WAVE_FORMAT_IEEE_FLOAT:
      return 'float';
    default:
      return null;
  }
}

/**
 * Decode a `fmt ` chunk body. Extensible formats are resolved to the
 * format code stored in the first two bytes of their sub-format GUID.
 */
export function parseFmtChunk(body: Buffer): SourceFormat {
  if (body.length < MIN_FMT_SIZE) {
    throw new FormatError(`fmt chunk too short (${body.length} bytes)`);
  }

  let formatTag = body.readUInt16LE(0);
  if (formatTag === WAVE_FORMAT_EXTENSIBLE) {
    if (body.length < EXTENSIBLE_FMT_SIZE) {
      throw new FormatError('Extensible fmt chunk is missing its sub-format');
    }
    formatTag = body.readUInt16LE(24);
  }

  return {
    formatTag,
    encoding: encodingForFormatTag(formatTag),
    channels: body.readUInt16LE(2),
    sampleRate: body.readUInt32LE(4),
    blockAlign: body.readUInt16LE(12),
    bitsPerSample: body.readUInt16LE(14),
  };
}

/**
 * Sequential reader over the sample data of a WAV file
 */
export class WavFileReader implements SourceFrameReader {
  readonly filePath: string;
  readonly format: SourceFormat;
  readonly dataLength: number;
  private readonly fd: number;
  private readonly dataOffset: number;
  private position = 0;
  private closed = false;

  private constructor(filePath: string, fd: number, format: SourceFormat, dataOffset: number, dataLength: number) {
    this.filePath = filePath;
    this.fd = fd;
    this.format = format;
    this.dataOffset = dataOffset;
    this.dataLength = dataLength;
  }

  private static log(level: 'debug' | 'info' | 'warn' | 'error', message: string, ...args: unknown[]): void {
    if (!logger) {
      try {
        logger = getLogger().child({ context: 'WavFileReader' });
      } catch {
        return;
      }
    }
    logger[level](message, ...args);
  }

  /**
   * Open a WAV file and position the reader at the start of its data chunk
   */
  static async open(filePath: string): Promise<WavFileReader> {
    const fd = await fs.open(filePath, 'r');

    try {
      const { size: fileSize } = await fs.stat(filePath);
      const riff = await readAt(fd, RIFF_HEADER_SIZE, 0);

      if (riff.length < RIFF_HEADER_SIZE
        || riff.toString('ascii', 0, 4) !== 'RIFF'
        || riff.toString('ascii', 8, 12) !== 'WAVE') {
        throw new FormatError(`Not a RIFF/WAVE file: ${filePath}`);
      }

      let format: SourceFormat | null = null;
      let dataOffset = -1;
      let dataSize = 0;
      let offset = RIFF_HEADER_SIZE;

      while (offset + CHUNK_HEADER_SIZE <= fileSize && (format === null || dataOffset < 0)) {
        const header = await readAt(fd, CHUNK_HEADER_SIZE, offset);
        const id = header.toString('ascii', 0, 4);
        const size = header.readUInt32LE(4);
        const bodyStart = offset + CHUNK_HEADER_SIZE;

        if (id === 'fmt ') {
          format = parseFmtChunk(await readAt(fd, Math.min(size, EXTENSIBLE_FMT_SIZE), bodyStart));
        } else if (id === 'data') {
          dataOffset = bodyStart;
          dataSize = size;
        }

        // Chunks are padded to an even size
        offset = bodyStart + size + (size % 2);
      }

      if (!format) {
        throw new FormatError(`Missing fmt chunk: ${filePath}`);
      }
      if (dataOffset < 0) {
        throw new FormatError(`Missing data chunk: ${filePath}`);
      }

      const dataLength = Math.max(0, Math.min(dataSize, fileSize - dataOffset));
      if (dataLength < dataSize) {
        WavFileReader.log('warn', `Data chunk of ${filePath} is truncated: ${dataLength} of ${dataSize} bytes present`);
      }

      WavFileReader.log(
        'debug',
        `Opened ${filePath}: ${format.channels} ch, ${format.sampleRate} Hz, ` +
        `${format.bitsPerSample} bit, ${dataLength} data bytes`
      );

      return new WavFileReader(filePath, fd, format, dataOffset, dataLength);
    } catch (error) {
      await fs.close(fd);
      throw error;
    }
  }

  async read(buffer: Buffer, length: number): Promise<number> {
    const wanted = Math.min(length, buffer.length, this.dataLength - this.position);
    let filled = 0;

    while (filled < wanted) {
      const { bytesRead } = await fs.read(
        this.fd,
        buffer,
        filled,
        wanted - filled,
        this.dataOffset + this.position + filled
      );
      if (bytesRead === 0) {
        break;
      }
      filled += bytesRead;
    }

    this.position += filled;
    return filled;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await fs.close(this.fd);
  }
}

async function readAt(fd: number, length: number, position: number): Promise<Buffer> {
  const buffer = Buffer.alloc(length);
  const { bytesRead } = await fs.read(fd, buffer, 0, length, position);
  return buffer.subarray(0, bytesRead);
}
