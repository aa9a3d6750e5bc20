/**
 * Progress Reporter
 * Percent-complete and ETA from frame counters
 */
import { ExtractionProgress } from '../types/index.js';

/**
 * Progress snapshot for the given counters.
 * An empty source (totalFrames 0) counts as 100% with no ETA.
 */
export function computeProgress(
  framesProcessed: number,
  totalFrames: number,
  elapsedMs: number
): ExtractionProgress {
  if (totalFrames <= 0) {
    return { percent: 100, framesProcessed, totalFrames, elapsedMs };
  }

  const percent = Math.min(100, Math.max(0, Math.floor((framesProcessed * 100) / totalFrames)));
  const progress: ExtractionProgress = { percent, framesProcessed, totalFrames, elapsedMs };

  if (framesProcessed > 0) {
    const remainingFrames = Math.max(0, totalFrames - framesProcessed);
    progress.estimatedRemainingMs = (elapsedMs / framesProcessed) * remainingFrames;
  }

  return progress;
}

/**
 * Emits a snapshot only when the integer percent moves
 */
export class ProgressTracker {
  private readonly totalFrames: number;
  private readonly now: () => number;
  private readonly startedAt: number;
  private lastPercent = -1;

  constructor(totalFrames: number, now: () => number = Date.now) {
    this.totalFrames = totalFrames;
    this.now = now;
    this.startedAt = now();
  }

  /**
   * @returns the new snapshot, or null if the percent is unchanged
   */
  update(framesProcessed: number): ExtractionProgress | null {
    const progress = computeProgress(framesProcessed, this.totalFrames, this.elapsedMs());
    // percent never goes backwards
    if (progress.percent <= this.lastPercent) {
      return null;
    }
    this.lastPercent = progress.percent;
    return progress;
  }

  elapsedMs(): number {
    return this.now() - this.startedAt;
  }

  get lastReportedPercent(): number {
    return this.lastPercent;
  }
}

function formatClock(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

/**
 * Single status line, e.g. `Progress:  42% | Frames: 1000/2400 | Elapsed: 00:03 | ETA: 00:04`
 */
export function formatProgressLine(progress: ExtractionProgress): string {
  const eta = progress.estimatedRemainingMs === undefined
    ? '--:--'
    : formatClock(progress.estimatedRemainingMs);

  return (
    `Progress: ${String(progress.percent).padStart(3)}% | ` +
    `Frames: ${progress.framesProcessed}/${progress.totalFrames} | ` +
    `Elapsed: ${formatClock(progress.elapsedMs)} | ETA: ${eta}`
  );
}
