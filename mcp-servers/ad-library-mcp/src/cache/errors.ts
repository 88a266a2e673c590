export class InvalidInputError extends Error {
  readonly code = 'INVALID_INPUT';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export class StorageWriteError extends Error {
  readonly code = 'STORAGE_WRITE_FAILURE';
  readonly path?: string;

  constructor(message: string, options: { path?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'StorageWriteError';
    this.path = options.path;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
