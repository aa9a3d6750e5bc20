/**
 * Stereo-Pair Detector
 * Groups channel descriptors into stereo pairs by their trailing L/R letter
 */
import {
  ChannelDescriptor,
  ChannelPlan,
  MonoPlanEntry,
  PairConflict,
  PlanEntry,
  StereoGroup,
  StereoPlanEntry,
  StereoSide,
} from '../types/index.js';
import { lazyModuleLogger } from '../utils/logger.js';

const log = lazyModuleLogger('StereoPairDetector');

const TRAILING_SEPARATORS = /[-_. ]+$/;

type PendingEntry = Omit<StereoPlanEntry, 'fileName'> | Omit<MonoPlanEntry, 'fileName'>;

/**
 * Side and base name for a channel named like `oh-l` / `amb r`,
 * or null when the name does not end in l/r or leaves no base
 */
export function parseStereoSide(name: string): { baseName: string; side: StereoSide } | null {
  if (name.length === 0) {
    return null;
  }

  const last = name[name.length - 1].toLowerCase();
  if (last !== 'l' && last !== 'r') {
    return null;
  }

  const baseName = name.slice(0, -1).replace(TRAILING_SEPARATORS, '').toLowerCase();
  if (baseName.length === 0) {
    return null;
  }

  return { baseName, side: last === 'l' ? 'left' : 'right' };
}

interface DetectionState {
  groups: ReadonlyMap<string, StereoGroup>;
  mono: readonly ChannelDescriptor[];
  conflicts: readonly PairConflict[];
}

function accumulate(state: DetectionState, descriptor: ChannelDescriptor): DetectionState {
  const parsed = parseStereoSide(descriptor.name);
  if (!parsed) {
    return { ...state, mono: [...state.mono, descriptor] };
  }

  const { baseName, side } = parsed;
  const existing = state.groups.get(baseName) ?? { baseName };
  const replacedIndex = existing[side];

  const groups = new Map(state.groups);
  groups.set(
    baseName,
    side === 'left' ? { ...existing, left: descriptor.index } : { ...existing, right: descriptor.index }
  );

  const conflicts = replacedIndex === undefined
    ? state.conflicts
    : [...state.conflicts, { baseName, side, replacedIndex, index: descriptor.index }];

  return { ...state, groups, conflicts };
}

function monoStem(descriptor: ChannelDescriptor): string {
  return descriptor.name.length > 0 ? descriptor.name : `channel-${descriptor.index + 1}`;
}

/**
 * Give every entry a file name that is unique within the output directory
 */
function assignFileNames(entries: readonly PendingEntry[]): PlanEntry[] {
  const used = new Set<string>();

  return entries.map((entry): PlanEntry => {
    const stem = entry.kind === 'stereo' ? `${entry.name}-stereo` : entry.name;
    let candidate = stem;
    for (let n = 2; used.has(candidate.toLowerCase()); n++) {
      candidate = `${stem}-${n}`;
    }
    if (candidate !== stem) {
      log('warn', `Output name "${stem}" already taken, writing "${candidate}.wav" instead`);
    }
    used.add(candidate.toLowerCase());

    const fileName = `${candidate}.wav`;
    return entry.kind === 'stereo'
      ? { kind: 'stereo', name: entry.name, left: entry.left, right: entry.right, fileName }
      : { kind: 'mono', name: entry.name, index: entry.index, fileName };
  });
}

/**
 * Partition descriptors into confirmed stereo pairs and mono channels.
 *
 * Entry order: confirmed pairs (first-seen order), plain mono channels,
 * then orphaned sides renamed `<base>-l` / `<base>-r`. A side seen twice
 * keeps the later channel and is reported in `conflicts`.
 */
export function detectChannelPlan(descriptors: readonly ChannelDescriptor[]): ChannelPlan {
  const initial: DetectionState = { groups: new Map(), mono: [], conflicts: [] };
  const { groups, mono, conflicts } = descriptors.reduce(accumulate, initial);

  const stereoEntries: PendingEntry[] = [];
  const orphanEntries: PendingEntry[] = [];

  for (const group of groups.values()) {
    if (group.left !== undefined && group.right !== undefined) {
      stereoEntries.push({ kind: 'stereo', name: group.baseName, left: group.left, right: group.right });
      continue;
    }
    if (group.left !== undefined) {
      orphanEntries.push({ kind: 'mono', name: `${group.baseName}-l`, index: group.left });
    }
    if (group.right !== undefined) {
      orphanEntries.push({ kind: 'mono', name: `${group.baseName}-r`, index: group.right });
    }
  }

  const monoEntries = mono.map((descriptor): PendingEntry => ({
    kind: 'mono',
    name: monoStem(descriptor),
    index: descriptor.index,
  }));

  for (const conflict of conflicts) {
    log(
      'warn',
      `Stereo group "${conflict.baseName}" ${conflict.side} side assigned twice: ` +
      `channel ${conflict.replacedIndex} replaced by channel ${conflict.index}`
    );
  }

  const entries = assignFileNames([...stereoEntries, ...monoEntries, ...orphanEntries]);

  log(
    'debug',
    `Detected ${stereoEntries.length} stereo pair(s), ` +
    `${monoEntries.length + orphanEntries.length} mono channel(s)`
  );

  return { entries, conflicts };
}

/**
 * Source channel indices of an entry, in output channel order
 */
export function sourceChannelsOf(entry: PlanEntry): number[] {
  return entry.kind === 'stereo' ? [entry.left, entry.right] : [entry.index];
}
