/**
 * Import errors.
 *
 * FormatError covers everything wrong with the input itself (container,
 * archive, log lines). It is fatal: the run stops at the failing record.
 */

export interface FormatErrorContext {
  /** File being read when the error occurred */
  file?: string;
  /** 1-based line number within `file` */
  line?: number;
  /** Id of the record being imported */
  recordId?: string;
  cause?: unknown;
}

export class FormatError extends Error {
  readonly file?: string;
  readonly line?: number;
  readonly recordId?: string;

  constructor(message: string, context: FormatErrorContext = {}) {
    super(message, { cause: context.cause });
    this.name = 'FormatError';
    this.file = context.file;
    this.line = context.line;
    this.recordId = context.recordId;
  }

  /** Message with location appended, for CLI output. */
  describe(): string {
    const where: string[] = [];
    if (this.file) where.push(this.line !== undefined ? `${this.file}:${this.line}` : this.file);
    if (this.recordId) where.push(`record ${this.recordId}`);
    return where.length > 0 ? `${this.message} (${where.join(', ')})` : this.message;
  }
}

export class StoreNotInitializedError extends Error {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(`Target database is not initialized: ${path}`, { cause });
    this.name = 'StoreNotInitializedError';
    this.path = path;
  }
}

/**
 * A record could not be written for a reason other than its format
 * (for example the store rejected it).
 */
export class RecordImportError extends Error {
  readonly file: string;
  readonly line: number;

  constructor(file: string, line: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to import ${file}:${line}: ${reason}`, { cause });
    this.name = 'RecordImportError';
    this.file = file;
    this.line = line;
  }
}

/**
 * Attach file/line context to an error raised while importing a record.
 */
export function withRecordContext(err: unknown, context: { file: string; line: number }): Error {
  if (err instanceof FormatError) {
    if (err.line !== undefined) return err;
    return new FormatError(err.message, {
      file: context.file,
      line: context.line,
      recordId: err.recordId,
      cause: err.cause,
    });
  }
  return new RecordImportError(context.file, context.line, err);
}
