/**
 * Fatal errors raised by the I/O layer around the pipeline.
 * Per-record problems never surface as exceptions; they are counted in ValidationStats.
 */

export class HealthExportError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'HealthExportError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends HealthExportError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

export class InputNotFoundError extends HealthExportError {
  public readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    super(`File not found: ${path}`, 'INPUT_NOT_FOUND', options);
    this.name = 'InputNotFoundError';
    this.path = path;
  }
}

export class ArchiveError extends HealthExportError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'ARCHIVE_ERROR', options);
    this.name = 'ArchiveError';
  }
}

export class ExportParseError extends HealthExportError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'EXPORT_PARSE_ERROR', options);
    this.name = 'ExportParseError';
  }
}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
