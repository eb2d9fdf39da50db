/**
 * Request-scoped failures. Each one carries the HTTP status the API answers
 * with and a stable machine-readable code.
 */
export abstract class DiagnosisError extends Error {
  abstract readonly status: number;
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class EmptyUploadError extends DiagnosisError {
  readonly status = 400;
  readonly code = 'empty_upload';

  constructor() {
    super('Uploaded file is empty');
  }
}

export class PayloadTooLargeError extends DiagnosisError {
  readonly status = 413;
  readonly code = 'payload_too_large';

  constructor(readonly limitBytes: number, readonly actualBytes?: number) {
    super(`File exceeds maximum size of ${formatMegabytes(limitBytes)} MB`);
  }
}

export class UnsupportedFormatError extends DiagnosisError {
  readonly status = 415;
  readonly code = 'unsupported_format';
}

export type InferenceFailureReason =
  | 'network'
  | 'authentication'
  | 'rate_limited'
  | 'timeout'
  | 'upstream';

export class InferenceUnavailableError extends DiagnosisError {
  readonly status = 503;
  readonly code = 'inference_unavailable';

  constructor(readonly reason: InferenceFailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigError';
  }
}

function formatMegabytes(bytes: number): string {
  const mb = bytes / (1024 * 1024);
  return Number.isInteger(mb) ? String(mb) : mb.toFixed(1);
}
