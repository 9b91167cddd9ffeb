/** Base class for every error the auditor raises on purpose. */
export class AuditError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AuditError';
  }
}

/** A config file failed to parse. Nothing from the file is applied. */
export class ConfigParseError extends AuditError {
  readonly line: number | null;
  readonly path: string | null;

  constructor(message: string, line: number | null = null, path: string | null = null) {
    super(formatConfigMessage(message, line, path));
    this.name = 'ConfigParseError';
    this.line = line;
    this.path = path;
  }

  /** Re-raise this error attributed to the file it came from. */
  withPath(path: string): ConfigParseError {
    const detail = this.line !== null ? stripLinePrefix(this.message, this.line) : this.message;
    return new ConfigParseError(detail, this.line, path);
  }
}

/** A config file exists but could not be read. */
export class ConfigReadError extends AuditError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`read config "${path}": ${describeCause(cause)}`, { cause });
    this.name = 'ConfigReadError';
    this.path = path;
  }
}

/** An exclude-topic glob is malformed. */
export class InvalidPatternError extends AuditError {
  readonly pattern: string;

  constructor(pattern: string, detail: string) {
    super(`invalid exclude topic pattern "${pattern}": ${detail}`);
    this.name = 'InvalidPatternError';
    this.pattern = pattern;
  }
}

/** A command line argument or connection option is invalid. */
export class InvalidArgumentError extends AuditError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export type MetadataFetchErrorKind = 'auth' | 'network' | 'unknown';

/** Fetching cluster metadata failed. */
export class MetadataFetchError extends AuditError {
  readonly kind: MetadataFetchErrorKind;

  constructor(message: string, kind: MetadataFetchErrorKind, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'MetadataFetchError';
    this.kind = kind;
  }
}

export type ScanErrorKind = 'not_found' | 'io';

/** Scanning the repository failed. */
export class ScanError extends AuditError {
  readonly kind: ScanErrorKind;

  constructor(message: string, kind: ScanErrorKind, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'ScanError';
    this.kind = kind;
  }
}

/** Raised by the CLI when findings exist and the caller asked to fail on them. */
export class FindingsError extends AuditError {
  readonly count: number;

  constructor(count: number) {
    super(`${String(count)} findings detected`);
    this.name = 'FindingsError';
    this.count = count;
  }
}

/** Render an unknown thrown value as a message. */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}

function formatConfigMessage(message: string, line: number | null, path: string | null): string {
  const located = line !== null ? `line ${String(line)}: ${message}` : message;
  return path !== null ? `parse config "${path}": ${located}` : located;
}

function stripLinePrefix(message: string, line: number): string {
  const prefix = `line ${String(line)}: `;
  return message.startsWith(prefix) ? message.slice(prefix.length) : message;
}
