/**
 * Winston logger configuration
 */
import winston from 'winston';
import path from 'path';
import fs from 'fs-extra';

const { combine, timestamp, printf, colorize, json, errors } = winston.format;

/**
 * Logger options, usually taken from `Config.logging`
 */
export interface LoggerOptions {
  level: string;
  format: 'json' | 'simple';
  toFile: boolean;
  toConsole: boolean;
  logsPath: string;
  moduleFilter?: string[];
}

/**
 * Allowed modules for logging (populated from config)
 */
let allowedModules: Set<string> | null = null;

/**
 * Error values serialise as name, message and cause
 */
function metaReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return value.cause === undefined
      ? { name: value.name, message: value.message }
      : { name: value.name, message: value.message, cause: value.cause };
  }
  return value;
}

/**
 * Drops entries whose context is not in the module filter
 */
const moduleFilter = winston.format((info) => {
  if (!allowedModules || allowedModules.size === 0) {
    return info;
  }

  if (typeof info.context === 'string' && !allowedModules.has(info.context)) {
    return false;
  }

  // Root logger entries carry no context
  return info;
});

const consoleFormat = printf(({ level, message, timestamp, context, ...meta }) => {
  const contextStr = typeof context === 'string' ? `[${context}]` : '';
  const metaStr = Object.keys(meta).length ? JSON.stringify(meta, metaReplacer) : '';
  return `${String(timestamp)} [${level}]${contextStr}: ${String(message)} ${metaStr}`;
});

/**
 * Create logger instance
 */
export function createLogger(options: LoggerOptions): winston.Logger {
  const transports: winston.transport[] = [];

  if (options.moduleFilter && options.moduleFilter.length > 0) {
    allowedModules = new Set(options.moduleFilter);
  } else {
    allowedModules = null;
  }

  if (options.toConsole) {
    transports.push(
      new winston.transports.Console({
        // Progress is drawn on stdout, keep log lines off it
        stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
        format: combine(
          moduleFilter(),
          colorize(),
          timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
          errors({ stack: true }),
          consoleFormat
        ),
      })
    );
  }

  if (options.toFile) {
    fs.ensureDirSync(options.logsPath);

    transports.push(
      new winston.transports.File({
        filename: path.join(options.logsPath, 'channel-extractor.log'),
        format: combine(
          moduleFilter(),
          timestamp(),
          errors({ stack: true }),
          options.format === 'json' ? json() : consoleFormat
        ),
      })
    );
  }

  // winston warns when a logger has no transports at all
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ silent: true }));
  }

  return winston.createLogger({
    level: options.level,
    transports,
    exitOnError: false,
  });
}

/**
 * Default logger instance (initialized in main.ts, or by tests)
 */
let loggerInstance: winston.Logger | null = null;

/**
 * Initialize the default logger
 */
export function initLogger(config: LoggerOptions): void {
  loggerInstance = createLogger(config);

  if (config.moduleFilter && config.moduleFilter.length > 0) {
    loggerInstance.debug(`Log filtering enabled for modules: ${config.moduleFilter.join(', ')}`);
  }
}

/**
 * Get the logger instance
 * @throws Error if logger not initialized
 */
export function getLogger(): winston.Logger {
  if (!loggerInstance) {
    throw new Error('Logger not initialized. Call initLogger() first.');
  }
  return loggerInstance;
}

/**
 * Create a child logger with context
 */
export function createChildLogger(context: string): winston.Logger {
  return getLogger().child({ context });
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger handle for a module that may load before `initLogger()` runs.
 * Resolves the child logger on first use and stays silent until then.
 */
export function lazyModuleLogger(context: string): (level: LogLevel, message: string, ...args: unknown[]) => void {
  let logger: winston.Logger | null = null;

  return (level, message, ...args) => {
    if (!logger) {
      if (!loggerInstance) {
        return;
      }
      logger = createChildLogger(context);
    }
    logger[level](message, ...args);
  };
}
