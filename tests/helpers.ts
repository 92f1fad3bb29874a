import { PassThrough } from 'stream';
import type { ConnectionState, MediaKind, MediaTrack, MediaUnit, PeerSession } from '../src/capture/types';

export const unit = (bytes: number[], sequenceNumber = 0): MediaUnit => ({
  payload: Buffer.from(bytes),
  marker: false,
  sequenceNumber,
  timestamp: 0,
});

export interface FakeTrack {
  track: MediaTrack;
  push(...units: MediaUnit[]): void;
  end(): void;
}

export function createFakeTrack(id: string, kind: MediaKind, codec: string): FakeTrack {
  const stream = new PassThrough({ objectMode: true });
  let ended = false;
  return {
    track: { id, kind, codec, units: stream },
    push: (...units) => units.forEach((u) => stream.write(u)),
    end: () => {
      if (ended) return;
      ended = true;
      stream.end();
    },
  };
}

/**
 * `hangs` resolves without ever reaching `closed`; `stalls` never settles at all.
 */
export type CloseBehaviour = 'closes' | 'throws' | 'hangs' | 'stalls';

export interface FakePeerOptions {
  offerError?: Error;
  gatheringCompletes?: boolean;
  localSdp?: string;
  applyError?: Error;
  /** State reached right after the answer is applied; undefined leaves the session connecting. */
  stateAfterAnswer?: ConnectionState;
  /** Tracks announced once the session connects. */
  tracks?: FakeTrack[];
  closeBehaviour?: CloseBehaviour;
}

/** In-process PeerSession whose lifecycle is scripted by the test. */
export class FakePeerSession implements PeerSession {
  closeCalls = 0;
  appliedAnswers: string[] = [];
  private state: ConnectionState = 'new';
  private stateListeners = new Set<(state: ConnectionState) => void>();
  private trackListeners = new Set<(track: MediaTrack) => void>();
  private options: FakePeerOptions;

  constructor(options: FakePeerOptions = {}) {
    this.options = options;
  }

  async createLocalOffer() {
    if (this.options.offerError) throw this.options.offerError;
    return 'v=0 initial-offer';
  }

  whenGatheringComplete() {
    if (this.options.gatheringCompletes === false) {
      return new Promise<void>(() => undefined);
    }
    return Promise.resolve();
  }

  localDescription() {
    return 'localSdp' in this.options ? this.options.localSdp : 'v=0 gathered-offer';
  }

  async applyRemoteAnswer(sdp: string) {
    if (this.options.applyError) throw this.options.applyError;
    this.appliedAnswers.push(sdp);
    this.setState('connecting');
    const next = this.options.stateAfterAnswer;
    if (next) {
      setTimeout(() => this.setState(next), 0);
    }
  }

  connectionState() {
    return this.state;
  }

  onConnectionStateChange(listener: (state: ConnectionState) => void) {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  onTrack(listener: (track: MediaTrack) => void) {
    this.trackListeners.add(listener);
    return () => {
      this.trackListeners.delete(listener);
    };
  }

  async close() {
    this.closeCalls += 1;
    this.endTracks();
    const behaviour = this.options.closeBehaviour ?? 'closes';
    if (behaviour === 'throws') {
      throw new Error('transport already torn down');
    }
    if (behaviour === 'stalls') {
      await new Promise<void>(() => undefined);
    }
    if (behaviour === 'closes') {
      this.setState('closed');
    }
  }

  setState(state: ConnectionState) {
    this.state = state;
    [...this.stateListeners].forEach((listener) => listener(state));
    if (state === 'connected') {
      (this.options.tracks ?? []).forEach((fake) => {
        [...this.trackListeners].forEach((listener) => listener(fake.track));
      });
    }
  }

  private endTracks() {
    (this.options.tracks ?? []).forEach((fake) => fake.end());
  }
}
