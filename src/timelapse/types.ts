import type { TimeInterval } from '../time/interval';

export interface TimestampedArtifact {
  /** File path of the still. */
  readonly identifier: string;
  readonly capturedAt: Date;
}

export interface ScheduledFrame {
  readonly artifact: TimestampedArtifact;
  /** 0 marks the final frame: the encoder holds it without an explicit duration. */
  readonly displayDurationMs: number;
}

export interface ScheduleOptions {
  interval?: TimeInterval;
  /** Output frames per second ceiling; no frame except the last plays shorter than 1/maxOutputRate. */
  maxOutputRate?: number;
}

export interface ArtifactNaming {
  prefix: string;
  extension: string;
}
