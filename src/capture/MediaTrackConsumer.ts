import type { Logger } from '../logging';
import { H264Depacketizer } from './h264Depacketizer';
import { createOneShot } from './oneShot';
import type { MediaTrack } from './types';

export const RECOGNIZED_VIDEO_CODECS: ReadonlySet<string> = new Set(['video/h264']);

export const isRecordableTrack = (track: MediaTrack) =>
  track.kind === 'video' && RECOGNIZED_VIDEO_CODECS.has(track.codec.toLowerCase());

/**
 * Drains the session's media tracks. The first recordable video track is
 * depacketized into a single buffer that is published exactly once, when that
 * track ends; every other track is read to completion and discarded.
 */
export class MediaTrackConsumer {
  private claimedTrackId: string | null = null;
  private readonly delivery = createOneShot<Buffer>();
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  get claimed() {
    return this.claimedTrackId !== null;
  }

  get delivered() {
    return this.delivery.published;
  }

  whenDelivered(): Promise<Buffer> {
    return this.delivery.promise;
  }

  accept(track: MediaTrack) {
    this.log('Received track', track.kind, track.codec, track.id);
    if (this.claimedTrackId === null && isRecordableTrack(track)) {
      this.claimedTrackId = track.id;
      this.record(track).catch((err) => this.log('Recording track failed', err));
      return;
    }
    this.drain(track).catch((err) => this.log('Draining track failed', err));
  }

  private async record(track: MediaTrack) {
    const depacketizer = new H264Depacketizer();
    const chunks: Buffer[] = [];
    this.log('Buffering video data from', track.id);
    try {
      for await (const unit of track.units) {
        chunks.push(...depacketizer.push(unit));
      }
    } catch (err) {
      // keep what was captured before the read error
      this.log('Track ended with error', err instanceof Error ? err.message : err);
    } finally {
      const buffer = Buffer.concat(chunks);
      this.log(`Track ${track.id} ended with ${buffer.length} bytes`);
      this.delivery.publish(buffer);
    }
  }

  private async drain(track: MediaTrack) {
    const reason = track.kind !== 'video' ? `non-video track ${track.kind}` : `unrecorded track ${track.codec}`;
    this.log('Skipping', reason);
    let ignored = 0;
    for await (const unit of track.units) {
      ignored += unit.payload.length > 0 ? 1 : 0;
    }
    this.log(`Drained ${ignored} units from ${track.id}`);
  }

  private log(...args: unknown[]) {
    if (this.logger) {
      this.logger('[consumer]', ...args);
    }
  }
}
