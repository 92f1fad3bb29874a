import { createError } from '../errors';
import { containsInstant } from '../time/interval';
import type { ScheduledFrame, ScheduleOptions, TimestampedArtifact } from './types';

export const DEFAULT_MAX_OUTPUT_RATE = 60;

const assertPositive = (value: number, name: string) => {
  if (!Number.isFinite(value) || value <= 0) {
    throw createError('InvalidArgument', `${name} must be a positive number, got ${value}`, 'schedule');
  }
};

/**
 * Turns timestamped stills into a playback schedule compressed by `ratio`
 * (real seconds per output second).
 *
 * Stills whose scaled gap to the pending frame is shorter than
 * `1 / maxOutputRate` are dropped rather than shown for a sliver of time, so
 * the ratio stays exact. The last frame always carries a 0 duration.
 */
export function scheduleFrames(
  artifacts: readonly TimestampedArtifact[],
  ratio: number,
  options: ScheduleOptions = {},
): ScheduledFrame[] {
  const maxOutputRate = options.maxOutputRate ?? DEFAULT_MAX_OUTPUT_RATE;
  assertPositive(ratio, 'speedup ratio');
  assertPositive(maxOutputRate, 'maximum output rate');

  const { interval } = options;
  const candidates = interval
    ? artifacts.filter((artifact) => containsInstant(interval, artifact.capturedAt))
    : [...artifacts];

  if (candidates.length === 0) {
    const bound = interval
      ? `between ${interval.start.toISOString()} and ${interval.end.toISOString()}`
      : 'in the input set';
    throw createError('NoArtifacts', `no artifacts found ${bound}`, 'schedule');
  }

  // Array.prototype.sort is stable, so equal timestamps keep discovery order
  const sorted = candidates.sort((a, b) => a.capturedAt.getTime() - b.capturedAt.getTime());

  const minDurationMs = 1000 / maxOutputRate;
  const frames: ScheduledFrame[] = [];
  let current = sorted[0];

  for (const next of sorted.slice(1)) {
    const gapMs = (next.capturedAt.getTime() - current.capturedAt.getTime()) / ratio;
    if (gapMs < minDurationMs) continue;
    frames.push({ artifact: current, displayDurationMs: gapMs });
    current = next;
  }

  frames.push({ artifact: current, displayDurationMs: 0 });
  return frames;
}
