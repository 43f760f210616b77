/**
 * Collage Error Types
 *
 * Standardized error types for the collage pipeline. Config, scan and
 * write errors are fatal for a run; decode and composite errors only
 * skip the affected image.
 */

/**
 * Base collage error
 */
export class CollageError extends Error {
  readonly code: string;
  readonly timestamp: number;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CollageError';
    this.code = code;
    this.timestamp = Date.now();
  }
}

/**
 * Invalid options; raised before any file is touched
 */
export class ConfigError extends CollageError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('INVALID_CONFIG', `Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }

  static invalid(problem: string): ConfigError {
    return new ConfigError([problem]);
  }
}

/**
 * Input directory cannot be found, created or listed
 */
export class ScanError extends CollageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SCAN_FAILED', message, options);
    this.name = 'ScanError';
  }

  static cannotCreate(dir: string, reason: string, cause?: unknown): ScanError {
    return new ScanError(`Error creating directory ${dir}: ${reason}`, { cause });
  }

  static notADirectory(dir: string): ScanError {
    return new ScanError(`Not a directory: ${dir}`);
  }

  static unreadable(dir: string, reason: string, cause?: unknown): ScanError {
    return new ScanError(`Cannot read directory ${dir}: ${reason}`, { cause });
  }
}

/**
 * One source image could not be decoded or fitted
 */
export class DecodeError extends CollageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DECODE_FAILED', message, options);
    this.name = 'DecodeError';
  }

  static failed(file: string, reason: string, cause?: unknown): DecodeError {
    return new DecodeError(`Cannot decode ${file}: ${reason}`, { cause });
  }
}

/**
 * A fitted image could not be pasted onto the canvas
 */
export class CompositeError extends CollageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('COMPOSITE_FAILED', message, options);
    this.name = 'CompositeError';
  }

  static failed(file: string, reason: string, cause?: unknown): CompositeError {
    return new CompositeError(`Cannot paste ${file}: ${reason}`, { cause });
  }
}

/**
 * The collage could not be encoded or persisted
 */
export class WriteError extends CollageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('WRITE_FAILED', message, options);
    this.name = 'WriteError';
  }

  static failed(file: string, reason: string, cause?: unknown): WriteError {
    return new WriteError(`Error saving collage ${file}: ${reason}`, { cause });
  }
}

export function isCollageError(value: unknown): value is CollageError {
  return value instanceof CollageError;
}

/**
 * Extract a readable message from an unknown thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
