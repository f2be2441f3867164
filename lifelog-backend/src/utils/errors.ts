/**
 * Raised when a derived-timeline batch violates its ordering precondition
 * (e.g. clock skew produced a timestamp earlier than its predecessor).
 */
export class DataIntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DataIntegrityError';
  }
}

/** Raised when a frame cannot be decoded as an image. */
export class FrameDecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FrameDecodeError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
