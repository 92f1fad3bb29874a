export type PipelineErrorKind =
  // capture session
  | 'NegotiationTimeout'
  | 'NegotiationRejected'
  | 'ConnectionTimeout'
  | 'ConnectionFailed'
  | 'SessionDropped'
  | 'CloseTimeout'
  | 'CloseFailed'
  | 'NoMediaReceived'
  // scheduling
  | 'NoArtifacts'
  // time expressions
  | 'MalformedTimestamp'
  | 'MalformedDuration'
  | 'MalformedSpeedup'
  | 'OverdeterminedInterval'
  | 'InvertedInterval'
  // collaborators and glue
  | 'DeviceNotFound'
  | 'SignalRelayFailed'
  | 'CredentialsUnavailable'
  | 'EncoderUnavailable'
  | 'EncoderFailed'
  | 'ScanFailed'
  | 'OutputExists'
  | 'InvalidArgument';

export type PipelineStage =
  | 'negotiate'
  | 'connect'
  | 'record'
  | 'close'
  | 'collect'
  | 'schedule'
  | 'parse'
  | 'interval'
  | 'scan'
  | 'device'
  | 'auth'
  | 'encode'
  | 'cli';

/** Advisory kinds are reported alongside a successful result instead of being thrown. */
export const ADVISORY_KINDS: ReadonlySet<PipelineErrorKind> = new Set(['CloseTimeout', 'CloseFailed']);

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly stage: PipelineStage;

  constructor(kind: PipelineErrorKind, message: string, stage: PipelineStage, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'PipelineError';
    this.kind = kind;
    this.stage = stage;
  }

  get advisory() {
    return ADVISORY_KINDS.has(this.kind);
  }
}

export const createError = (
  kind: PipelineErrorKind,
  message: string,
  stage: PipelineStage,
  cause?: unknown,
) => new PipelineError(kind, message, stage, cause);

export const isPipelineError = (err: unknown): err is PipelineError => err instanceof PipelineError;

export const describeError = (err: unknown) => {
  if (isPipelineError(err)) {
    return `Error [${err.kind}] (${err.stage}): ${err.message}`;
  }
  return `Error: ${err instanceof Error ? err.message : String(err)}`;
};

