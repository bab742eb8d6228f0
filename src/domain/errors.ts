export type DynoErrorCode = 'INVALID_PARAMETER' | 'ZERO_BRAKE_POWER' | 'EXPORT_FAILED';

export class DynoError extends Error {
  readonly code: DynoErrorCode;
  readonly context: Record<string, unknown>;

  constructor(message: string, code: DynoErrorCode, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DynoError';
    this.code = code;
    this.context = context;
  }
}

export class InvalidParameterError extends DynoError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid parameter "${field}": ${message}`, 'INVALID_PARAMETER', { field });
    this.name = 'InvalidParameterError';
    this.field = field;
  }
}

export class ModelError extends DynoError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'ZERO_BRAKE_POWER', context);
    this.name = 'ModelError';
  }
}

export class ExportError extends DynoError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to export ${path}: ${reason}`, 'EXPORT_FAILED', { path }, { cause });
    this.name = 'ExportError';
    this.path = path;
  }
}
