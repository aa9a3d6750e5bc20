/**
 * Channel Metadata Builder
 * Turns raw channel labels into indexed descriptors
 */
import { ChannelDescriptor, ExtraChannelPolicy } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { lazyModuleLogger } from '../utils/logger.js';

const log = lazyModuleLogger('ChannelMetadataBuilder');

export const UNUSED_MARKER = '(unused)';

// Path separators and characters Windows refuses in file names
const UNSAFE_FILE_CHARS = /[\/\\:*?"<>|]/g;

/**
 * Lower-case, drop parentheses, spaces and unsafe file name characters to hyphens
 */
export function normalizeChannelName(label: string): string {
  return label
    .toLowerCase()
    .replace(/[()]/g, '')
    .replace(/ /g, '-')
    .replace(UNSAFE_FILE_CHARS, '-');
}

export function isUnusedLabel(label: string): boolean {
  return label.toLowerCase().includes(UNUSED_MARKER);
}

/**
 * Build descriptors for every label not marked "(unused)".
 * The descriptor index is the label's position; duplicate names are kept.
 */
export function buildChannelDescriptors(labels: readonly string[]): ChannelDescriptor[] {
  const descriptors: ChannelDescriptor[] = [];

  labels.forEach((label, index) => {
    if (isUnusedLabel(label)) {
      log('debug', `Channel ${index} marked unused: "${label}"`);
      return;
    }
    descriptors.push({ index, name: normalizeChannelName(label) });
  });

  return descriptors;
}

/**
 * Check the label list against the source channel count.
 *
 * More labels than channels is always an error. Source channels without a
 * label are dropped under `ignore` and rejected under `error`.
 */
export function validateLabelCount(
  labels: readonly string[],
  channelCount: number,
  policy: ExtraChannelPolicy
): void {
  if (labels.length === 0) {
    throw new ConfigurationError('Channel label list is empty');
  }

  if (labels.length > channelCount) {
    throw new ConfigurationError(
      `${labels.length} channel labels configured but the source only has ${channelCount} channels`
    );
  }

  if (labels.length < channelCount) {
    const unlabelled = channelCount - labels.length;
    if (policy === 'error') {
      throw new ConfigurationError(
        `Source has ${channelCount} channels but only ${labels.length} labels are configured`
      );
    }
    log('warn', `Ignoring ${unlabelled} unlabelled source channel(s) after channel ${labels.length - 1}`);
  }
}
