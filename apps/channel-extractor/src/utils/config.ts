/**
 * Configuration loader and validator
 */
import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';
import { ExtraChannelPolicy } from '../types/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Application root (same depth from src/utils and dist/utils)
 */
export const APP_ROOT = path.resolve(__dirname, '../..');

// Load environment variables
dotenv.config({ path: path.join(APP_ROOT, '.env') });

export const DEFAULT_CHUNK_FRAMES = 16384;

/**
 * Application configuration
 */
export interface Config {
  extraction: {
    channelConfigPath: string;
    chunkFrames: number;
    extraChannels: ExtraChannelPolicy;
  };
  output: {
    dirSuffix: string;
    cleanExisting: boolean;
  };
  logging: {
    level: string;
    format: 'json' | 'simple';
    toFile: boolean;
    toConsole: boolean;
    logsPath: string;
    moduleFilter?: string[];
  };
}

function isExtraChannelPolicy(value: string): value is ExtraChannelPolicy {
  return value === 'ignore' || value === 'error';
}

/**
 * Raw configuration before validation; the policy may still be an unknown string
 */
export type UnvalidatedConfig = Omit<Config, 'extraction'> & {
  extraction: Omit<Config['extraction'], 'extraChannels'> & { extraChannels: string };
};

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): UnvalidatedConfig {
  return {
    extraction: {
      channelConfigPath: path.resolve(APP_ROOT, env.CHANNEL_CONFIG_PATH || './channel-config.txt'),
      chunkFrames: parseInt(env.CHUNK_FRAMES || String(DEFAULT_CHUNK_FRAMES), 10),
      extraChannels: env.EXTRA_CHANNEL_POLICY || 'ignore',
    },
    output: {
      dirSuffix: env.OUTPUT_DIR_SUFFIX ?? '_extracted',
      cleanExisting: env.CLEAN_OUTPUT_DIR !== 'false',
    },
    logging: {
      level: env.LOG_LEVEL || 'info',
      format: env.LOG_FORMAT === 'json' ? 'json' : 'simple',
      toFile: env.LOG_TO_FILE === 'true',
      toConsole: env.LOG_TO_CONSOLE !== 'false',
      logsPath: path.resolve(APP_ROOT, env.LOGS_PATH || './logs'),
      moduleFilter: env.LOG_MODULE_FILTER
        ? env.LOG_MODULE_FILTER.split(',').map(m => m.trim()).filter(m => m.length > 0)
        : undefined,
    },
  };
}

/**
 * Validate configuration
 * @throws Error listing every invalid setting
 */
export function validateConfig(config: UnvalidatedConfig): Config {
  const errors: string[] = [];

  if (!config.extraction.channelConfigPath) {
    errors.push('CHANNEL_CONFIG_PATH is required');
  }

  if (!Number.isInteger(config.extraction.chunkFrames) || config.extraction.chunkFrames <= 0) {
    errors.push('CHUNK_FRAMES must be a positive integer');
  }

  const extraChannels = config.extraction.extraChannels;
  if (!isExtraChannelPolicy(extraChannels)) {
    errors.push(`EXTRA_CHANNEL_POLICY must be 'ignore' or 'error' (got '${extraChannels}')`);
  }

  if (config.output.dirSuffix.length === 0) {
    errors.push('OUTPUT_DIR_SUFFIX must not be empty');
  }

  if (errors.length > 0 || !isExtraChannelPolicy(extraChannels)) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return {
    ...config,
    extraction: { ...config.extraction, extraChannels },
  };
}

/**
 * Get validated configuration
 */
export function getConfig(): Config {
  return validateConfig(loadConfig());
}
