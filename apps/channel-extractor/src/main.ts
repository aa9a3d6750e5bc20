#!/usr/bin/env node
/**
 * Channel Extractor - CLI entry point
 * Usage: channel-extractor [input.wav] [outputDir]
 */
import path from 'path';
import fs from 'fs-extra';
import readline from 'readline/promises';
import { getConfig, Config } from './utils/config.js';
import { initLogger, getLogger } from './utils/logger.js';
import { ChannelConfigLoader } from './services/channel-config.service.js';
import { WavFileReader } from './services/wav-reader.service.js';
import { extractChannels } from './modules/ChannelExtractor.js';
import { formatProgressLine } from './modules/ProgressReporter.js';

const EXIT_FAILED = 1;
const EXIT_CANCELLED = 130;

function cleanPathInput(value: string): string {
  return value.trim().replace(/^["']+|["']+$/g, '').trim();
}

/**
 * @returns an error message, or null if the file can be extracted
 */
async function checkInputFile(inputFile: string): Promise<string | null> {
  if (!(await fs.pathExists(inputFile))) {
    return 'File does not exist.';
  }

  if (path.extname(inputFile).toLowerCase() !== '.wav') {
    return 'Input file must be a .wav file.';
  }

  let reader: WavFileReader | null = null;
  try {
    reader = await WavFileReader.open(inputFile);
    if (reader.format.channels < 2) {
      return 'Input WAV file must have multiple channels.';
    }
  } catch (error) {
    return `Error reading WAV file: ${error instanceof Error ? error.message : String(error)}`;
  } finally {
    await reader?.close();
  }

  return null;
}

/**
 * Validate the input file, asking again on a terminal until it is usable
 */
async function resolveInputFile(initial: string | undefined): Promise<string | null> {
  let candidate = initial ? cleanPathInput(initial) : '';
  const interactive = Boolean(process.stdin.isTTY);
  const rl = interactive ? readline.createInterface({ input: process.stdin, output: process.stdout }) : null;

  try {
    for (;;) {
      if (!candidate) {
        if (!rl) {
          console.error('No input file given.');
          return null;
        }
        candidate = cleanPathInput(await rl.question('Enter path to input WAV file: '));
        continue;
      }

      const problem = await checkInputFile(candidate);
      if (!problem) {
        return path.resolve(candidate);
      }

      console.error(problem);
      if (!rl) {
        return null;
      }
      candidate = '';
    }
  } finally {
    rl?.close();
  }
}

function defaultOutputDir(inputFile: string, config: Config): string {
  const baseName = path.basename(inputFile, path.extname(inputFile));
  return path.join(path.dirname(inputFile), `${baseName}${config.output.dirSuffix}`);
}

async function main(): Promise<number> {
  const config = getConfig();
  initLogger(config.logging);
  const logger = getLogger();

  const [inputArg, outputArg] = process.argv.slice(2);

  const inputFile = await resolveInputFile(inputArg);
  if (!inputFile) {
    return EXIT_FAILED;
  }

  const outputDir = outputArg ? path.resolve(cleanPathInput(outputArg)) : defaultOutputDir(inputFile, config);

  if (config.output.cleanExisting && (await fs.pathExists(outputDir))) {
    await fs.remove(outputDir);
    logger.info(`Deleted existing output directory: ${outputDir}`);
  }

  const labels = await new ChannelConfigLoader(config.extraction.channelConfigPath).load();
  if (labels.length === 0) {
    logger.error(`Channel configuration is empty: ${config.extraction.channelConfigPath}`);
    return EXIT_FAILED;
  }

  // First Ctrl+C stops after the current chunk, a second one exits immediately
  const controller = new AbortController();
  const onSigint = () => {
    if (controller.signal.aborted) {
      process.exit(EXIT_CANCELLED);
    }
    console.log('\nCancellation requested...');
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  logger.info(`Extracting ${inputFile} → ${outputDir}`);

  try {
    const result = await extractChannels(inputFile, outputDir, labels, {
      chunkFrames: config.extraction.chunkFrames,
      extraChannels: config.extraction.extraChannels,
      signal: controller.signal,
      onProgress: (progress) => {
        process.stdout.write(`\r${formatProgressLine(progress)}   `);
      },
    });

    switch (result.status) {
      case 'completed':
        console.log('\n\nExtraction complete.');
        console.log('\nExtracted channel files:');
        for (const output of result.outputs) {
          console.log(`- ${output.filePath}`);
        }
        return 0;

      case 'cancelled':
        console.log('\nExtraction cancelled.');
        return EXIT_CANCELLED;

      case 'failed':
        console.error(`\nError: ${result.error.message}`);
        return EXIT_FAILED;
    }
  } finally {
    process.off('SIGINT', onSigint);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`Fatal error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = EXIT_FAILED;
  });
