import type { ProcessingErrorKind } from '../models/tagging';

export abstract class TaggingError extends Error {
  abstract readonly kind: Exclude<ProcessingErrorKind, 'internal'>;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends TaggingError {
  readonly kind = 'validation' as const;
}

export class UpstreamError extends TaggingError {
  readonly kind = 'upstream' as const;
  readonly status?: number;

  constructor(message: string, options?: { status?: number }) {
    super(message);
    this.status = options?.status;
  }
}

export class ComputationError extends TaggingError {
  readonly kind = 'computation' as const;
}

export function describeError(error: unknown): { kind: ProcessingErrorKind; message: string } {
  if (error instanceof TaggingError) {
    return { kind: error.kind, message: error.message };
  }
  return {
    kind: 'internal',
    message: error instanceof Error ? error.message : 'Unknown error',
  };
}
