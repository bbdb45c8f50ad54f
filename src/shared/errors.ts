export enum ConverterErrorCode {
  SOURCE_UNREADABLE = 'SOURCE_UNREADABLE',
  DESTINATION_UNWRITABLE = 'DESTINATION_UNWRITABLE',
  STREAM_INTERRUPTED = 'STREAM_INTERRUPTED',
  CONFIG_NOT_FOUND = 'CONFIG_NOT_FOUND',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

export interface ConverterErrorContext {
  /** File the failing open or config read targeted. */
  path?: string;
  source?: string;
  destination?: string;
  /** Lines handed to the transformer before a mid-stream failure. */
  linesRead?: number;
  /** Node errno string, e.g. ENOENT or ENOSPC. */
  errno?: string;
  cause?: string;
  /** Schema issues as `dotted.path: message`. */
  issues?: string[];
}

export class ConverterError extends Error {
  readonly code: ConverterErrorCode;
  readonly context: ConverterErrorContext;

  constructor(code: ConverterErrorCode, message: string, context: ConverterErrorContext = {}) {
    super(message);
    this.name = 'ConverterError';
    this.code = code;
    this.context = context;
  }

  /** The errno of the underlying fs failure, when there was one. */
  get errno(): string | undefined {
    return this.context.errno;
  }
}

/** Flattens an underlying fs error into context fields. */
export function describeCause(err: unknown): Pick<ConverterErrorContext, 'errno' | 'cause'> {
  if (err instanceof Error) {
    const errno = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    return errno ? { errno, cause: err.message } : { cause: err.message };
  }
  return { cause: String(err) };
}
