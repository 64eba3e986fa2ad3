export class SidecarError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Request body could not be decoded; the reader is never called. */
export class DecodeError extends SidecarError {}

/** Any failure surfaced by the reader, including mid-scan iteration errors. */
export class ReaderError extends SidecarError {}

export class RowLimitExceededError extends SidecarError {
  readonly limit: number;

  constructor(limit: number) {
    super(`max row count (${limit}) exceeded`);
    this.limit = limit;
  }
}

/** Binding or serving failed. Returned to whoever started the server, never sent over HTTP. */
export class StartupError extends SidecarError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Prefixes the cause's message with a short context, keeping the cause attached.
export function wrapReaderError(context: string | null, cause: unknown): ReaderError {
  const message = context ? `${context}: ${errorMessage(cause)}` : errorMessage(cause);
  return new ReaderError(message, { cause });
}
