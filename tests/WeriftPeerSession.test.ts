import { describe, expect, it } from 'vitest';
import { trackIdOf } from '../src/capture/WeriftPeerSession';

describe('trackIdOf', () => {
  it('keeps the id the remote side announced', () => {
    expect(trackIdOf('camera-video', 'video', 2)).toBe('camera-video');
  });

  it('names anonymous tracks after kind and arrival order', () => {
    expect(trackIdOf(undefined, 'video', 2)).toBe('video-2');
    expect(trackIdOf('', 'audio', 1)).toBe('audio-1');
  });
});
