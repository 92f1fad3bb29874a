import path from 'path';
import type { ScheduledFrame } from './types';

const quotePath = (filePath: string) => filePath.replace(/'/g, "'\\''");

/** One ffmpeg concat-demuxer entry; the 0-duration sentinel gets no duration line. */
export function formatConcatEntry(frame: ScheduledFrame) {
  const file = `file 'file://${quotePath(path.resolve(frame.artifact.identifier))}'`;
  if (frame.displayDurationMs > 0) {
    return `${file}\nduration ${(frame.displayDurationMs / 1000).toFixed(6)}`;
  }
  return file;
}

export function buildConcatScript(frames: readonly ScheduledFrame[]) {
  return frames.map((frame) => `${formatConcatEntry(frame)}\n`).join('');
}
