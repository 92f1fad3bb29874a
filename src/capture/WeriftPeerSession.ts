import { Readable } from 'stream';
import { RTCPeerConnection, RTCRtpCodecParameters } from 'werift';
import type { Logger } from '../logging';
import type { ConnectionState, MediaKind, MediaTrack, MediaUnit, PeerSession } from './types';

export interface WeriftPeerSessionOptions {
  stunServer?: string;
  logger?: Logger;
}

const DEFAULT_STUN_SERVER = 'stun:stun.l.google.com:19302';

const H264_MIME = 'video/H264';
const OPUS_MIME = 'audio/opus';

const CONNECTION_STATES: readonly ConnectionState[] = ['new', 'connecting', 'connected', 'disconnected', 'failed', 'closed'];

const toConnectionState = (state: string): ConnectionState =>
  CONNECTION_STATES.find((known) => known === state) ?? 'new';

/** Remote tracks may arrive without an id; those are named after their kind and arrival order. */
export const trackIdOf = (id: string | undefined, kind: MediaKind, ordinal: number) => id || `${kind}-${ordinal}`;

/**
 * PeerSession backed by a werift RTCPeerConnection: receive-only audio and
 * video, a `trigger` data channel (the camera expects an application section),
 * and one object-mode stream of RTP units per remote track.
 */
export class WeriftPeerSession implements PeerSession {
  private pc: RTCPeerConnection;
  private trackEnders = new Set<() => void>();
  private tracksSeen = 0;
  private logger?: Logger;

  constructor(options: WeriftPeerSessionOptions = {}) {
    this.logger = options.logger;
    this.pc = new RTCPeerConnection({
      iceServers: [{ urls: options.stunServer ?? DEFAULT_STUN_SERVER }],
      codecs: {
        video: [
          new RTCRtpCodecParameters({
            mimeType: H264_MIME,
            clockRate: 90000,
            rtcpFeedback: [{ type: 'nack' }, { type: 'nack', parameter: 'pli' }, { type: 'goog-remb' }],
            parameters: 'profile-level-id=42e01f;packetization-mode=1;level-asymmetry-allowed=1',
          }),
        ],
        audio: [new RTCRtpCodecParameters({ mimeType: OPUS_MIME, clockRate: 48000, channels: 2 })],
      },
    });
    this.pc.addTransceiver('audio', { direction: 'recvonly' });
    this.pc.addTransceiver('video', { direction: 'recvonly' });
    this.pc.createDataChannel('trigger');

    this.pc.connectionStateChange.subscribe((state) => {
      if (state === 'closed' || state === 'failed') {
        this.endTracks();
      }
    });
  }

  async createLocalOffer() {
    const offer = await this.pc.createOffer();
    await this.pc.setLocalDescription(offer);
    return offer.sdp;
  }

  whenGatheringComplete() {
    return new Promise<void>((resolve) => {
      if (this.pc.iceGatheringState === 'complete') {
        resolve();
        return;
      }
      const { unSubscribe } = this.pc.iceGatheringStateChange.subscribe((state) => {
        if (state === 'complete') {
          unSubscribe();
          resolve();
        }
      });
    });
  }

  localDescription() {
    return this.pc.localDescription?.sdp;
  }

  async applyRemoteAnswer(sdp: string) {
    await this.pc.setRemoteDescription({ type: 'answer', sdp });
  }

  connectionState() {
    return toConnectionState(this.pc.connectionState);
  }

  onConnectionStateChange(listener: (state: ConnectionState) => void) {
    const { unSubscribe } = this.pc.connectionStateChange.subscribe((state) => listener(toConnectionState(state)));
    return unSubscribe;
  }

  onTrack(listener: (track: MediaTrack) => void) {
    const { unSubscribe } = this.pc.onTrack.subscribe((track) => {
      if (track.kind !== 'audio' && track.kind !== 'video') {
        this.log('Ignoring track of kind', track.kind);
        return;
      }
      const kind: MediaKind = track.kind === 'audio' ? 'audio' : 'video';
      const units = new Readable({ objectMode: true, read: () => undefined });
      const rtpSubscription = track.onReceiveRtp.subscribe((rtp) => {
        const unit: MediaUnit = {
          payload: rtp.payload,
          marker: rtp.header.marker,
          sequenceNumber: rtp.header.sequenceNumber,
          timestamp: rtp.header.timestamp,
        };
        units.push(unit);
      });
      this.trackEnders.add(() => {
        rtpSubscription.unSubscribe();
        units.push(null);
      });
      listener({
        id: trackIdOf(track.id, kind, ++this.tracksSeen),
        kind,
        // the session only negotiates one codec per kind
        codec: track.codec?.mimeType ?? (kind === 'video' ? H264_MIME : OPUS_MIME),
        units,
      });
    });
    return unSubscribe;
  }

  async close() {
    await this.pc.close();
    this.endTracks();
  }

  private endTracks() {
    const enders = [...this.trackEnders];
    this.trackEnders.clear();
    enders.forEach((end) => end());
  }

  private log(...args: unknown[]) {
    if (this.logger) {
      this.logger('[peer]', ...args);
    }
  }
}
