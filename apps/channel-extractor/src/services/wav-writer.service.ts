/**
 * WAV file writer
 * Writes a canonical 44-byte header, appends sample data and patches sizes on close
 */
import fs from 'fs-extra';
import path from 'path';
import { AudioFormat, OutputSink, SinkFactory } from '../types/index.js';
import { WAVE_FORMAT_IEEE_FLOAT, WAVE_FORMAT_PCM } from './wav-reader.service.js';

export const WAV_HEADER_SIZE = 44;

/**
 * Canonical RIFF/WAVE header for `dataLength` bytes of samples
 */
export function buildWavHeader(format: AudioFormat, dataLength: number): Buffer {
  const header = Buffer.alloc(WAV_HEADER_SIZE);
  const padding = dataLength % 2;

  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + dataLength + padding, 4);
  header.write('WAVE', 8, 'ascii');

  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(format.encoding === 'float' ? WAVE_FORMAT_IEEE_FLOAT : WAVE_FORMAT_PCM, 20);
  header.writeUInt16LE(format.channels, 22);
  header.writeUInt32LE(format.sampleRate, 24);
  header.writeUInt32LE(format.sampleRate * format.blockAlign, 28);
  header.writeUInt16LE(format.blockAlign, 32);
  header.writeUInt16LE(format.bitsPerSample, 34);

  header.write('data', 36, 'ascii');
  header.writeUInt32LE(dataLength, 40);

  return header;
}

/**
 * Sequential WAV writer
 */
export class WavFileWriter implements OutputSink {
  readonly filePath: string;
  readonly format: AudioFormat;
  private readonly fd: number;
  private dataLength = 0;
  private closed = false;

  private constructor(filePath: string, format: AudioFormat, fd: number) {
    this.filePath = filePath;
    this.format = format;
    this.fd = fd;
  }

  /**
   * Create (or truncate) `filePath`, creating parent directories as needed
   */
  static async create(filePath: string, format: AudioFormat): Promise<WavFileWriter> {
    await fs.ensureDir(path.dirname(filePath));
    const fd = await fs.open(filePath, 'w');

    try {
      await writeFully(fd, buildWavHeader(format, 0), 0);
    } catch (error) {
      await fs.close(fd);
      throw error;
    }

    return new WavFileWriter(filePath, format, fd);
  }

  get bytesWritten(): number {
    return this.dataLength;
  }

  async append(data: Buffer): Promise<void> {
    if (this.closed) {
      throw new Error(`Cannot write to closed WAV file: ${this.filePath}`);
    }
    await writeFully(this.fd, data, WAV_HEADER_SIZE + this.dataLength);
    this.dataLength += data.length;
  }

  /**
   * Finalize header sizes and release the file handle
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    try {
      if (this.dataLength % 2 === 1) {
        await writeFully(this.fd, Buffer.alloc(1), WAV_HEADER_SIZE + this.dataLength);
      }
      await writeFully(this.fd, buildWavHeader(this.format, this.dataLength), 0);
    } finally {
      await fs.close(this.fd);
    }
  }
}

async function writeFully(fd: number, data: Buffer, position: number): Promise<void> {
  let written = 0;
  while (written < data.length) {
    const { bytesWritten } = await fs.write(fd, data, written, data.length - written, position + written);
    written += bytesWritten;
  }
}

/**
 * Sink factory writing WAV files
 */
export const createWavSink: SinkFactory = (filePath, format) => WavFileWriter.create(filePath, format);
