import { isDomainError, type ErrorCategory } from '@homestock/domain';

export enum ErrorCode {
  INTERNAL = 'INTERNAL',
  NOT_FOUND = 'NOT_FOUND',
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  VALIDATION = 'VALIDATION',
  CONFLICT = 'CONFLICT',
  BAD_REQUEST = 'BAD_REQUEST',
}

const HTTP_STATUS_MAP: Record<ErrorCode, number> = {
  [ErrorCode.INTERNAL]: 500,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.FORBIDDEN]: 403,
  [ErrorCode.VALIDATION]: 422,
  [ErrorCode.CONFLICT]: 409,
  [ErrorCode.BAD_REQUEST]: 400,
};

const CATEGORY_CODE_MAP: Record<ErrorCategory, ErrorCode> = {
  NotFound: ErrorCode.NOT_FOUND,
  AlreadyExists: ErrorCode.CONFLICT,
  NotAuthorized: ErrorCode.FORBIDDEN,
  InvalidValue: ErrorCode.VALIDATION,
  InUse: ErrorCode.CONFLICT,
  ConcurrentConflict: ErrorCode.CONFLICT,
  DeleteFailed: ErrorCode.INTERNAL,
};

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly httpStatus: number;
  public readonly safeMeta: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, safeMeta: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
    this.httpStatus = HTTP_STATUS_MAP[code];
    this.safeMeta = safeMeta;
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      ...this.safeMeta,
    };
  }
}

/**
 * Translates anything thrown by the core into an `AppError` an API layer can
 * serialize. Unknown failures become `INTERNAL` without leaking their message.
 */
export function toAppError(err: unknown): AppError {
  if (err instanceof AppError) return err;
  if (isDomainError(err)) {
    const code = CATEGORY_CODE_MAP[err.category];
    const message = code === ErrorCode.INTERNAL ? 'Internal error' : err.message;
    return new AppError(code, message, { ...err.details, kind: err.kind }, { cause: err });
  }
  return new AppError(ErrorCode.INTERNAL, 'Internal error', {}, { cause: err });
}
