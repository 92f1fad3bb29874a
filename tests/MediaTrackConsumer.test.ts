import { describe, expect, it } from 'vitest';
import { isRecordableTrack, MediaTrackConsumer } from '../src/capture/MediaTrackConsumer';
import type { MediaTrack, MediaUnit } from '../src/capture/types';
import { createFakeTrack, unit } from './helpers';

const SPS = [0x67, 0x42];
const START = [0, 0, 0, 1];

describe('isRecordableTrack', () => {
  it('accepts H.264 video in any letter case', () => {
    expect(isRecordableTrack(createFakeTrack('v', 'video', 'video/H264').track)).toBe(true);
    expect(isRecordableTrack(createFakeTrack('v', 'video', 'video/h264').track)).toBe(true);
  });

  it('rejects other codecs and audio', () => {
    expect(isRecordableTrack(createFakeTrack('v', 'video', 'video/VP8').track)).toBe(false);
    expect(isRecordableTrack(createFakeTrack('a', 'audio', 'audio/opus').track)).toBe(false);
  });
});

describe('MediaTrackConsumer', () => {
  it('publishes the first recordable track when it ends', async () => {
    const consumer = new MediaTrackConsumer();
    const audio = createFakeTrack('a', 'audio', 'audio/opus');
    const first = createFakeTrack('v1', 'video', 'video/H264');
    const second = createFakeTrack('v2', 'video', 'video/H264');

    consumer.accept(audio.track);
    consumer.accept(first.track);
    consumer.accept(second.track);
    audio.push(unit([0xfc]));
    first.push(unit(SPS));
    second.push(unit([0x67, 0xff]));
    expect(consumer.claimed).toBe(true);
    expect(consumer.delivered).toBe(false);

    [audio, second, first].forEach((fake) => fake.end());

    expect([...(await consumer.whenDelivered())]).toEqual([...START, ...SPS]);
    expect(consumer.delivered).toBe(true);
  });

  it('does not claim a track it cannot record', () => {
    const consumer = new MediaTrackConsumer();
    const vp8 = createFakeTrack('v', 'video', 'video/VP8');

    consumer.accept(vp8.track);
    vp8.end();

    expect(consumer.claimed).toBe(false);
  });

  it('keeps data received before a read error', async () => {
    async function* failing(): AsyncGenerator<MediaUnit> {
      yield unit(SPS);
      throw new Error('socket reset');
    }
    const track: MediaTrack = { id: 'v', kind: 'video', codec: 'video/H264', units: failing() };
    const consumer = new MediaTrackConsumer();

    consumer.accept(track);

    expect([...(await consumer.whenDelivered())]).toEqual([...START, ...SPS]);
  });
});
