/**
 * Error taxonomy shared by the training pipeline, the hosting service and the client
 */

export enum MLErrorCode {
  DATA_LOAD_FAILED = 'DATA_LOAD_FAILED',
  TRAINING_FAILED = 'TRAINING_FAILED',
  PREDICTION_FAILED = 'PREDICTION_FAILED',
  MODEL_NOT_FOUND = 'MODEL_NOT_FOUND',
  INVALID_MODEL = 'INVALID_MODEL',
}

export class MLError extends Error {
  constructor(public code: MLErrorCode, message: string, public details?: unknown) {
    super(message);
    this.name = 'MLError';
  }
}

export enum ServiceErrorCode {
  INVALID_REQUEST = 'INVALID_REQUEST',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  AUTH_REJECTED = 'AUTH_REJECTED',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  REVISION_MISMATCH = 'REVISION_MISMATCH',
  VERSION_IMMUTABLE = 'VERSION_IMMUTABLE',
  RATE_LIMITED = 'RATE_LIMITED',
  UNREACHABLE = 'UNREACHABLE',
  INTERNAL = 'INTERNAL',
}

const STATUS_BY_CODE: Record<ServiceErrorCode, number> = {
  [ServiceErrorCode.INVALID_REQUEST]: 400,
  [ServiceErrorCode.SCHEMA_MISMATCH]: 400,
  [ServiceErrorCode.AUTH_REJECTED]: 401,
  [ServiceErrorCode.NOT_FOUND]: 404,
  [ServiceErrorCode.CONFLICT]: 409,
  [ServiceErrorCode.REVISION_MISMATCH]: 409,
  [ServiceErrorCode.VERSION_IMMUTABLE]: 409,
  [ServiceErrorCode.RATE_LIMITED]: 429,
  [ServiceErrorCode.UNREACHABLE]: 503,
  [ServiceErrorCode.INTERNAL]: 500,
};

export class ServiceError extends Error {
  constructor(public code: ServiceErrorCode, message: string) {
    super(message);
    this.name = 'ServiceError';
  }

  get status(): number {
    return STATUS_BY_CODE[this.code];
  }
}

export function isServiceErrorCode(value: unknown): value is ServiceErrorCode {
  return Object.values(ServiceErrorCode).some((code) => code === value);
}

export function serviceErrorCodeForStatus(status: number): ServiceErrorCode {
  switch (status) {
    case 400:
      return ServiceErrorCode.INVALID_REQUEST;
    case 401:
    case 403:
      return ServiceErrorCode.AUTH_REJECTED;
    case 404:
      return ServiceErrorCode.NOT_FOUND;
    case 409:
      return ServiceErrorCode.CONFLICT;
    case 429:
      return ServiceErrorCode.RATE_LIMITED;
    default:
      return ServiceErrorCode.INTERNAL;
  }
}
