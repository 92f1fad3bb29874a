import type { PipelineError } from '../errors';
import type { Logger } from '../logging';

export type CaptureState =
  | 'idle'
  | 'negotiating'
  | 'connected'
  | 'recording'
  | 'closing'
  | 'closed'
  | 'failed';

export type ConnectionState = 'new' | 'connecting' | 'connected' | 'disconnected' | 'failed' | 'closed';

export type MediaKind = 'audio' | 'video';

/** One RTP payload with the header fields a depacketizer needs. */
export interface MediaUnit {
  payload: Buffer;
  marker: boolean;
  sequenceNumber: number;
  timestamp: number;
}

export interface MediaTrack {
  id: string;
  kind: MediaKind;
  /** MIME type as negotiated, e.g. `video/H264`. */
  codec: string;
  /** Ends when the track or the session closes. */
  units: AsyncIterable<MediaUnit>;
}

export interface PeerSession {
  /** Creates the local offer and starts address gathering; returns the initial offer SDP. */
  createLocalOffer(): Promise<string>;
  whenGatheringComplete(): Promise<void>;
  /** Offer SDP including the gathered candidates. */
  localDescription(): string | undefined;
  applyRemoteAnswer(sdp: string): Promise<void>;
  connectionState(): ConnectionState;
  onConnectionStateChange(listener: (state: ConnectionState) => void): () => void;
  onTrack(listener: (track: MediaTrack) => void): () => void;
  close(): Promise<void>;
}

/** Relays the local offer to the device and returns its answer SDP. */
export type AnswerExchanger = (offerSdp: string) => Promise<string>;

export interface CaptureConfig {
  gatheringTimeoutMs: number;
  exchangeTimeoutMs: number;
  connectTimeoutMs: number;
  recordingMs: number;
  closeTimeoutMs: number;
  collectTimeoutMs: number;
}

export interface CaptureSessionOptions {
  peer: PeerSession;
  exchangeAnswer: AnswerExchanger;
  config?: Partial<CaptureConfig>;
  logger?: Logger;
}

export interface CaptureResult {
  buffer: Buffer;
  /** Advisory failures (close problems) that did not stop the capture. */
  warnings: PipelineError[];
}

export interface CaptureStatus {
  state: CaptureState;
  startedAt: string | null;
  lastError: string | null;
}
