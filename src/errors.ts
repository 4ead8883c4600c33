export class SourceUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'SourceUnavailableError';
  }
}

export class CaptureRetriesExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    super(`Frame capture failed ${attempts} consecutive times`);
    this.name = 'CaptureRetriesExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class DeviceError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DeviceError';
  }
}

export class NotifyError extends Error {
  readonly statusCode?: number;
  readonly isTimeout: boolean;

  constructor(message: string, statusCode?: number, isTimeout = false) {
    super(message);
    this.name = 'NotifyError';
    this.statusCode = statusCode;
    this.isTimeout = isTimeout;
  }
}

export class EncodeError extends Error {
  readonly seq: number;

  constructor(seq: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to encode frame ${seq}: ${detail}`, { cause });
    this.name = 'EncodeError';
    this.seq = seq;
  }
}

export class FrameUnavailableError extends Error {
  constructor(message = 'No frame available') {
    super(message);
    this.name = 'FrameUnavailableError';
  }
}

export class InvalidColorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidColorError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
