export class TranscriptError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The uploaded bytes are not a document this package can open. */
export class DocumentLoadError extends TranscriptError {
  readonly filename?: string;

  constructor(message: string, opts: { filename?: string; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.filename = opts.filename;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
