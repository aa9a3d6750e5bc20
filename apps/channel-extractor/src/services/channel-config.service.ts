/**
 * Channel label file loader
 */
import fs from 'fs-extra';
import { getLogger } from '../utils/logger.js';

let logger: ReturnType<typeof getLogger> | null = null;

/**
 * Reads channel labels, one per source channel, from a text file
 */
export class ChannelConfigLoader {
  private configPath: string;

  constructor(configPath: string) {
    this.configPath = configPath;

    // Lazy initialize logger
    if (!logger) {
      try {
        logger = getLogger().child({ context: 'ChannelConfigLoader' });
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

  get path(): string {
    return this.configPath;
  }

  /**
   * Load labels in file order, skipping blank lines.
   * A missing file yields an empty list.
   */
  async load(): Promise<string[]> {
    if (!(await fs.pathExists(this.configPath))) {
      this.log('warn', `Missing channel config file: ${this.configPath}`);
      return [];
    }

    const content = await fs.readFile(this.configPath, 'utf8');
    const labels = parseChannelLabels(content);

    this.log('info', `Loaded ${labels.length} channel labels from ${this.configPath}`);
    return labels;
  }
}

/**
 * Split file content into labels; blank lines are dropped, others trimmed
 */
export function parseChannelLabels(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}
