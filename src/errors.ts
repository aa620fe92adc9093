export type ErrorCode =
  | 'AuthenticationRequired'
  | 'ChannelUnavailable'
  | 'SendRejected'
  | 'ResolutionFailed'
  | 'TemplateError'
  | 'Unexpected';

export abstract class SidecarError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly status: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** No usable session on disk, or the stored one is no longer authorized. */
export class AuthenticationRequired extends SidecarError {
  readonly code = 'AuthenticationRequired';
  readonly status = 401;
}

export class ChannelUnavailable extends SidecarError {
  readonly code = 'ChannelUnavailable';
  readonly status = 503;
}

export class SendRejected extends SidecarError {
  readonly code = 'SendRejected';
  readonly status: number;

  constructor(message: string, readonly retryAfterSeconds?: number) {
    super(message);
    this.status = retryAfterSeconds === undefined ? 502 : 429;
  }
}

export type ResolutionFailure = 'NotFound' | 'InvalidHandle' | 'Ambiguous';

const RESOLUTION_STATUS: Record<ResolutionFailure, number> = {
  NotFound: 404,
  InvalidHandle: 400,
  Ambiguous: 409
};

export class ResolutionFailed extends SidecarError {
  readonly code = 'ResolutionFailed';
  readonly status: number;

  constructor(readonly reason: ResolutionFailure, message: string) {
    super(message);
    this.status = RESOLUTION_STATUS[reason];
  }
}

export class TemplateError extends SidecarError {
  readonly code = 'TemplateError';
  readonly status = 400;
}

export class UnexpectedError extends SidecarError {
  readonly code = 'Unexpected';
  readonly status = 500;
}

export function toSidecarError(err: unknown): SidecarError {
  if (err instanceof SidecarError) return err;
  return new UnexpectedError(err instanceof Error ? err.message : String(err));
}
