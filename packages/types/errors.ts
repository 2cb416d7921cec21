import { z } from 'zod';

export enum ErrorCode {
  E_VALIDATION = 'E_VALIDATION',
  E_NOT_FOUND = 'E_NOT_FOUND',
  E_NO_AVAILABILITY = 'E_NO_AVAILABILITY',
  E_PARSE = 'E_PARSE',
  E_EXTERNAL_SERVICE = 'E_EXTERNAL_SERVICE',
}

export const ExternalServiceName = z.enum(['calendar', 'intent', 'similarity']);
export type ExternalServiceName = z.infer<typeof ExternalServiceName>;

export const TimekeeperErrorShape = z.object({
  code: z.nativeEnum(ErrorCode),
  message: z.string(),
  metadata: z.record(z.unknown()).optional(),
});

export type TimekeeperErrorShape = z.infer<typeof TimekeeperErrorShape>;

export class TimekeeperError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly metadata?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TimekeeperError';
  }

  toJSON(): TimekeeperErrorShape {
    return {
      code: this.code,
      message: this.message,
      metadata: this.metadata,
    };
  }
}

/** Bad working hours, non-positive durations or recurrence counts, inverted ranges. */
export class ValidationError extends TimekeeperError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(ErrorCode.E_VALIDATION, message, metadata);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends TimekeeperError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(ErrorCode.E_NOT_FOUND, message, metadata);
    this.name = 'NotFoundError';
  }
}

export class NoAvailabilityError extends TimekeeperError {
  constructor(
    public readonly rangeStart: Date,
    public readonly rangeEnd: Date,
    public readonly durationMinutes: number,
  ) {
    super(
      ErrorCode.E_NO_AVAILABILITY,
      'No free slots available in the specified time range',
      {
        rangeStart: rangeStart.toISOString(),
        rangeEnd: rangeEnd.toISOString(),
        durationMinutes,
      },
    );
    this.name = 'NoAvailabilityError';
  }
}

export class ParseError extends TimekeeperError {
  constructor(
    public readonly input: string,
    message = `Could not parse "${input}"`,
  ) {
    super(ErrorCode.E_PARSE, message, { input });
    this.name = 'ParseError';
  }
}

/**
 * Wraps any transport, auth or provider failure coming out of a port adapter.
 * The original error is kept as `cause`.
 */
export class ExternalServiceError extends TimekeeperError {
  constructor(
    public readonly service: ExternalServiceName,
    message: string,
    cause?: unknown,
  ) {
    super(ErrorCode.E_EXTERNAL_SERVICE, message, { service }, { cause });
    this.name = 'ExternalServiceError';
  }

  static wrap(service: ExternalServiceName, op: string, error: unknown): ExternalServiceError {
    if (error instanceof ExternalServiceError) return error;
    const detail = error instanceof Error ? error.message : String(error);
    return new ExternalServiceError(service, `${service}.${op} failed: ${detail}`, error);
  }
}

export const isTimekeeperError = (err: unknown): err is TimekeeperError =>
  err instanceof TimekeeperError;
