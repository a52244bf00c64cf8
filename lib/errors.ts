export type CommonsErrorCode =
  | 'ELIGIBILITY'
  | 'AUTHENTICATION'
  | 'UPLOAD_CONFLICT'
  | 'TRANSPORT'
  | 'CONFIG';

export class CommonsExportError extends Error {
  readonly code: CommonsErrorCode;

  constructor(code: CommonsErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CommonsExportError';
    this.code = code;
  }
}

/**
 * Image can't be exported as-is (no rights, no title and no description).
 * Detected before any request is made.
 */
export class EligibilityError extends CommonsExportError {
  constructor(message: string) {
    super('ELIGIBILITY', message);
    this.name = 'EligibilityError';
  }
}

export class AuthenticationError extends CommonsExportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('AUTHENTICATION', message, options);
    this.name = 'AuthenticationError';
  }
}

/**
 * A file with the target name already exists and overwriting is off.
 */
export class UploadConflictError extends CommonsExportError {
  readonly pageName: string;

  constructor(pageName: string, message?: string) {
    super('UPLOAD_CONFLICT', message || `A file named "${pageName}" already exists on Commons`);
    this.name = 'UploadConflictError';
    this.pageName = pageName;
  }
}

export class TransportError extends CommonsExportError {
  readonly status?: number;
  readonly apiCode?: string;

  constructor(message: string, details: { status?: number; apiCode?: string; cause?: unknown } = {}) {
    super('TRANSPORT', message, { cause: details.cause });
    this.name = 'TransportError';
    this.status = details.status;
    this.apiCode = details.apiCode;
  }
}

export class ConfigError extends CommonsExportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG', message, options);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}
