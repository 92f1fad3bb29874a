import { createError, isPipelineError, type PipelineError, type PipelineErrorKind, type PipelineStage } from '../errors';
import type { Logger } from '../logging';
import { MediaTrackConsumer } from './MediaTrackConsumer';
import type {
  AnswerExchanger,
  CaptureConfig,
  CaptureResult,
  CaptureSessionOptions,
  CaptureState,
  CaptureStatus,
  ConnectionState,
  PeerSession,
} from './types';

export const DEFAULT_CONFIG: CaptureConfig = {
  gatheringTimeoutMs: 20_000,
  exchangeTimeoutMs: 30_000,
  connectTimeoutMs: 30_000,
  recordingMs: 5_000,
  closeTimeoutMs: 30_000,
  collectTimeoutMs: 5_000,
};

const messageOf = (err: unknown) => (err instanceof Error ? err.message : String(err));

const asFailure = (err: unknown, kind: PipelineErrorKind, stage: PipelineStage) =>
  isPipelineError(err) ? err : createError(kind, messageOf(err), stage, err);

interface ConnectionWatch {
  promise: Promise<ConnectionState>;
  cancel: () => void;
}

/**
 * Drives one capture over a negotiated peer session:
 * negotiating -> connected -> recording -> closing -> closed.
 *
 * Every wait is bounded by a timeout. Once a capture starts the peer is closed
 * exactly once, whichever way the run ends.
 */
export class CaptureSessionController {
  private state: CaptureState = 'idle';
  private timers: NodeJS.Timeout[] = [];
  private subscriptions: Array<() => void> = [];
  private startedAt: string | null = null;
  private lastError: string | null = null;
  private closeAttempt: Promise<PipelineError | null> | null = null;
  private config: CaptureConfig;
  private logger?: Logger;
  private peer: PeerSession;
  private exchangeAnswer: AnswerExchanger;
  private consumer: MediaTrackConsumer;

  constructor(options: CaptureSessionOptions) {
    this.peer = options.peer;
    this.exchangeAnswer = options.exchangeAnswer;
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.logger = options.logger;
    this.consumer = new MediaTrackConsumer(options.logger);
  }

  getStatus(): CaptureStatus {
    return {
      state: this.state,
      startedAt: this.startedAt,
      lastError: this.lastError,
    };
  }

  async capture(): Promise<CaptureResult> {
    if (this.state !== 'idle') {
      throw createError('InvalidArgument', `Capture session already used (state ${this.state})`, 'negotiate');
    }
    this.startedAt = new Date().toISOString();
    this.subscriptions.push(this.peer.onTrack((track) => this.consumer.accept(track)));
    const warnings: PipelineError[] = [];

    try {
      let dropped: PipelineError | null = null;
      try {
        await this.negotiate();
        await this.awaitConnected();
        dropped = await this.record();
      } catch (err) {
        await this.teardown(warnings);
        throw asFailure(err, 'NegotiationRejected', 'negotiate');
      }

      await this.teardown(warnings);
      if (dropped) throw dropped;

      const buffer = await this.collectBuffer();
      this.log(`Captured ${buffer.length} bytes of video`);
      return { buffer, warnings };
    } catch (err) {
      const failure = asFailure(err, 'NoMediaReceived', 'collect');
      this.fail(failure);
      throw failure;
    } finally {
      this.dispose();
    }
  }

  private async negotiate() {
    const { gatheringTimeoutMs, exchangeTimeoutMs } = this.config;
    this.transitionTo('negotiating');

    await this.peer.createLocalOffer().catch((err: unknown) => {
      throw createError('NegotiationRejected', `failed to create local offer: ${messageOf(err)}`, 'negotiate', err);
    });
    const gathered = this.peer.whenGatheringComplete().catch((err: unknown) => {
      throw createError('NegotiationRejected', `address gathering failed: ${messageOf(err)}`, 'negotiate', err);
    });
    await this.withTimeout(gathered, gatheringTimeoutMs, () =>
      createError('NegotiationTimeout', `address gathering did not complete within ${gatheringTimeoutMs}ms`, 'negotiate'),
    );
    this.log('Address gathering complete');

    const offer = this.peer.localDescription();
    if (!offer) {
      throw createError('NegotiationRejected', 'no local description after address gathering', 'negotiate');
    }

    const exchange = this.exchangeAnswer(offer).catch((err: unknown) => {
      if (isPipelineError(err)) throw err;
      throw createError('NegotiationRejected', `remote answer exchange failed: ${messageOf(err)}`, 'negotiate', err);
    });
    const answer = await this.withTimeout(exchange, exchangeTimeoutMs, () =>
      createError('NegotiationTimeout', `remote answer not received within ${exchangeTimeoutMs}ms`, 'negotiate'),
    );
    if (answer.trim() === '') {
      throw createError('NegotiationRejected', 'remote answer was empty', 'negotiate');
    }

    await this.peer.applyRemoteAnswer(answer).catch((err: unknown) => {
      throw createError('NegotiationRejected', `remote answer could not be applied: ${messageOf(err)}`, 'negotiate', err);
    });
  }

  private async awaitConnected() {
    const { connectTimeoutMs } = this.config;
    const watch = this.watchConnection((state) => state === 'connected' || state === 'failed' || state === 'closed');
    let state: ConnectionState;
    try {
      state = await this.withTimeout(watch.promise, connectTimeoutMs, () =>
        createError('ConnectionTimeout', `connection not established within ${connectTimeoutMs}ms`, 'connect'),
      );
    } finally {
      watch.cancel();
    }
    if (state !== 'connected') {
      throw createError('ConnectionFailed', `connection reached ${state} before connecting`, 'connect');
    }
    this.transitionTo('connected');
  }

  /** Holds the session open for the recording window; resolves with the drop error if the session ends early. */
  private async record(): Promise<PipelineError | null> {
    const { recordingMs } = this.config;
    this.transitionTo('recording');
    this.log(`Recording for ${recordingMs}ms`);

    const drop = this.watchConnection((state) => state === 'failed' || state === 'closed');
    const windowElapsed = new Promise<null>((resolve) => {
      this.schedule(() => resolve(null), recordingMs);
    });
    try {
      const dropped = await Promise.race([windowElapsed, drop.promise]);
      if (dropped === null) return null;
      return createError(
        'SessionDropped',
        `session ${dropped} before the ${recordingMs}ms recording window elapsed`,
        'record',
      );
    } finally {
      drop.cancel();
    }
  }

  private async teardown(warnings: PipelineError[]) {
    const advisory = await this.close();
    if (advisory) {
      warnings.push(advisory);
      this.log('Close warning', advisory.kind, advisory.message);
    }
    this.transitionTo('closed');
  }

  private close() {
    if (!this.closeAttempt) {
      this.closeAttempt = this.closePeer();
    }
    return this.closeAttempt;
  }

  private async closePeer(): Promise<PipelineError | null> {
    const { closeTimeoutMs } = this.config;
    this.transitionTo('closing');
    const watch = this.watchConnection((state) => state === 'closed');
    // the close call and the closed state share one deadline
    const closing = this.peer
      .close()
      .catch((err: unknown) => {
        throw createError('CloseFailed', `failed to close peer connection: ${messageOf(err)}`, 'close', err);
      })
      .then(() => watch.promise);
    try {
      await this.withTimeout(closing, closeTimeoutMs, () =>
        createError('CloseTimeout', `connection did not close within ${closeTimeoutMs}ms`, 'close'),
      );
      return null;
    } catch (err) {
      return asFailure(err, 'CloseFailed', 'close');
    } finally {
      watch.cancel();
    }
  }

  private async collectBuffer() {
    const { collectTimeoutMs } = this.config;
    const buffer = await this.withTimeout(this.consumer.whenDelivered(), collectTimeoutMs, () =>
      createError(
        'NoMediaReceived',
        this.consumer.claimed
          ? `video track did not end within ${collectTimeoutMs}ms of closing`
          : 'no H.264 video track was received during the recording window',
        'collect',
      ),
    );
    if (buffer.length === 0) {
      throw createError('NoMediaReceived', 'video track ended without any H.264 data', 'collect');
    }
    return buffer;
  }

  private watchConnection(settles: (state: ConnectionState) => boolean): ConnectionWatch {
    let unsubscribe: () => void = () => undefined;
    let done = false;
    const promise = new Promise<ConnectionState>((resolve) => {
      const check = (state: ConnectionState) => {
        if (done || !settles(state)) return;
        done = true;
        unsubscribe();
        resolve(state);
      };
      check(this.peer.connectionState());
      if (!done) {
        unsubscribe = this.peer.onConnectionStateChange(check);
      }
    });
    return {
      promise,
      cancel: () => {
        done = true;
        unsubscribe();
      },
    };
  }

  private withTimeout<T>(work: Promise<T>, timeoutMs: number, onTimeout: () => PipelineError): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const handle = this.schedule(() => reject(onTimeout()), timeoutMs);
      work.then(
        (value) => {
          this.unschedule(handle);
          resolve(value);
        },
        (err: unknown) => {
          this.unschedule(handle);
          reject(err);
        },
      );
    });
  }

  private transitionTo(state: CaptureState) {
    this.state = state;
    this.log('Capture state ->', state);
  }

  private fail(err: PipelineError) {
    this.lastError = err.message;
    this.transitionTo('failed');
    this.log('Capture failed', err.kind, err.message);
  }

  private schedule(task: () => void, delay: number) {
    const handle = setTimeout(task, delay);
    this.timers.push(handle);
    return handle;
  }

  private unschedule(handle: NodeJS.Timeout) {
    clearTimeout(handle);
    this.timers = this.timers.filter((t) => t !== handle);
  }

  private dispose() {
    this.timers.forEach((t) => clearTimeout(t));
    this.timers = [];
    this.subscriptions.forEach((unsubscribe) => unsubscribe());
    this.subscriptions = [];
  }

  private log(...args: unknown[]) {
    if (this.logger) {
      this.logger('[capture]', ...args);
    }
  }
}
