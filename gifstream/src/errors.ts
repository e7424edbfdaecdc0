/**
 * Error taxonomy for GIF export
 *
 * Every failure is fatal to the export call that raised it. The `code`
 * tells callers which stage of the export went wrong.
 */

export enum GifExportErrorCode {
  /** An encoder binary could not be started */
  LAUNCH_FAILED = 'LAUNCH_FAILED',
  /** Writing a frame into the pipeline failed */
  STREAM_WRITE_FAILED = 'STREAM_WRITE_FAILED',
  /** Invalid option combination, reported before any process starts */
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  /** The library backend is not installed */
  MISSING_DEPENDENCY = 'MISSING_DEPENDENCY',
  /** A frame or mask does not match its declared shape */
  FRAME_FORMAT = 'FRAME_FORMAT',
  /** Bytes handed to the GIF reader are not a GIF */
  INVALID_GIF = 'INVALID_GIF',
}

export class GifExportError extends Error {
  constructor(
    message: string,
    public readonly code: GifExportErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GifExportError';
  }
}

export function isGifExportError(error: unknown, code?: GifExportErrorCode): error is GifExportError {
  return error instanceof GifExportError && (code === undefined || error.code === code);
}

/**
 * Node system errors carry an errno string in `code`
 */
function errnoOf(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function describeCause(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

// Map errno codes seen when spawning or writing to an encoder to a hint
export function classifySpawnError(error: unknown): string {
  switch (errnoOf(error)) {
    case 'ENOENT':
      return 'the binary was not found; check that it is installed or set its path';
    case 'EACCES':
    case 'EPERM':
      return 'the binary is not executable by the current user';
    case 'EPIPE':
    case 'ERR_STREAM_DESTROYED':
    case 'ERR_STREAM_WRITE_AFTER_END':
      return 'the encoder closed its input early, usually because it rejected its arguments';
    case 'ENOSPC':
      return 'the disk is full';
    default:
      return 'the binary may be missing or misconfigured';
  }
}

export function launchFailed(program: string, cause: unknown): GifExportError {
  return new GifExportError(
    `Could not start encoder "${program}": ${describeCause(cause)} (${classifySpawnError(cause)})`,
    GifExportErrorCode.LAUNCH_FAILED,
    { cause }
  );
}

export function streamWriteFailed(filename: string, cause: unknown, hint?: string): GifExportError {
  let message = `Creation of ${filename} failed because of the following error: ${describeCause(cause)}`;
  message += ` (${classifySpawnError(cause)})`;
  if (hint) {
    message += `. ${hint}`;
  }
  return new GifExportError(message, GifExportErrorCode.STREAM_WRITE_FAILED, { cause });
}

export function invalidConfiguration(message: string, cause?: unknown): GifExportError {
  return new GifExportError(message, GifExportErrorCode.INVALID_CONFIGURATION, { cause });
}
