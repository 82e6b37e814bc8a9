/**
 * @fileoverview Langsense error hierarchy
 *
 * Typed, structured errors. Lookups and loads absorb most failures, so these
 * surface mainly from argument checks, configuration, and the CLI.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class LangsenseError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// ARGUMENT ERRORS
// ============================================================================

export class InvalidArgumentError extends LangsenseError {
  readonly code = 'INVALID_ARGUMENT';
  readonly retryable = false;

  constructor(
    readonly argument: string,
    message: string,
  ) {
    super(`Invalid ${argument}: ${message}`);
    this.name = 'InvalidArgumentError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { argument: this.argument },
    };
  }
}

export class KeyNotFoundError extends LangsenseError {
  readonly code = 'KEY_NOT_FOUND';
  readonly retryable = false;

  constructor(readonly key: unknown) {
    super(`Key not found: ${String(key)}`);
    this.name = 'KeyNotFoundError';
  }
}

// ============================================================================
// SNAPSHOT ERRORS
// ============================================================================

/**
 * `malformed` means the decoder rejected the bytes, `invalid_structure` means
 * they decoded to something other than a dictionary, `io` covers open/read.
 */
export type SnapshotErrorReason = 'malformed' | 'invalid_structure' | 'io';

export class SnapshotError extends LangsenseError {
  readonly code = 'SNAPSHOT_ERROR';
  readonly retryable: boolean;

  constructor(
    readonly reason: SnapshotErrorReason,
    readonly snapshotPath: string,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Snapshot ${reason} (${snapshotPath}): ${message}`);
    this.name = 'SnapshotError';
    this.retryable = reason === 'io';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        reason: this.reason,
        snapshotPath: this.snapshotPath,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigError extends LangsenseError {
  readonly code = 'CONFIG_ERROR';
  readonly retryable = false;

  constructor(
    message: string,
    readonly issues: string[] = [],
    readonly source?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { issues: this.issues, source: this.source },
    };
  }
}

// ============================================================================
// CAPABILITY ERRORS
// ============================================================================

export class RegistryDisposedError extends LangsenseError {
  readonly code = 'REGISTRY_DISPOSED';
  readonly retryable = false;

  constructor(operation: string) {
    super(`Cannot ${operation} on a disposed service registry`);
    this.name = 'RegistryDisposedError';
  }
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isLangsenseError(error: unknown): error is LangsenseError {
  return error instanceof LangsenseError;
}

export function isSnapshotError(error: unknown): error is SnapshotError {
  return error instanceof SnapshotError;
}
