/**
 * Error taxonomy shared by every module.
 *
 * Each class carries a `kind` so a structured response can be built from any
 * thrown value without `instanceof` chains on the consumer side.
 */

export type PackToolErrorKind =
  | 'io'
  | 'format'
  | 'decode'
  | 'encode'
  | 'schema'
  | 'dependency'
  | 'conflict'
  | 'replace'
  | 'config';

export abstract class PackToolError extends Error {
  abstract readonly kind: PackToolErrorKind;

  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing file, permission denied, short read. The message is the system's own. */
export class PackIoError extends PackToolError {
  readonly kind = 'io';

  constructor(message: string, public readonly path: string, cause?: unknown) {
    super(message, cause);
  }
}

/** Truncated or corrupt container header/index, unknown magic. */
export class PackFormatError extends PackToolError {
  readonly kind = 'format';

  constructor(message: string, public readonly path: string, cause?: unknown) {
    super(message, cause);
  }
}

/** A single entry could not be decoded. Its raw bytes are left untouched. */
export class DecodeError extends PackToolError {
  readonly kind = 'decode';

  constructor(message: string, public readonly path?: string, cause?: unknown) {
    super(message, cause);
  }
}

/** A decoded value does not fit its declared binary layout. */
export class EncodeError extends PackToolError {
  readonly kind = 'encode';

  constructor(message: string, public readonly path?: string, cause?: unknown) {
    super(message, cause);
  }
}

/** No definition matches the version stamped in a table payload. */
export class SchemaError extends PackToolError {
  readonly kind = 'schema';

  constructor(
    public readonly tableName: string,
    public readonly version: number,
    public readonly knownVersions: readonly number[],
    message?: string,
  ) {
    super(message ?? `No definition for table ${tableName} version ${version} (known versions: ${knownVersions.length > 0 ? knownVersions.join(', ') : 'none'}). The schema needs an update.`);
  }
}

/** Game path unset, cache missing or built against another schema. */
export class DependencyError extends PackToolError {
  readonly kind = 'dependency';
}

/** A mutation would clash with existing state; nothing was changed. */
export class ConflictError extends PackToolError {
  readonly kind = 'conflict';
}

/** A replacement targeted a layer that cannot be written. */
export class ReplaceError extends PackToolError {
  readonly kind = 'replace';
}

export class ConfigError extends PackToolError {
  readonly kind = 'config';
}

/**
 * Wraps a Node.js filesystem failure, keeping its message verbatim.
 */
export function toIoError(error: unknown, path: string): PackIoError {
  if (error instanceof PackIoError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new PackIoError(message, path, error);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Structured form of an error, as sent back by the session loop. */
export interface ErrorPayload {
  readonly kind: PackToolErrorKind | 'internal';
  readonly message: string;
}

export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof PackToolError) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: 'internal', message: describeError(error) };
}

/** Aggregate result of an operation that continues past individual failures. */
export interface BatchOutcome {
  readonly succeeded: string[];
  readonly failed: Array<{ readonly path: string; readonly error: ErrorPayload }>;
}
