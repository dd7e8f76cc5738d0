/**
 * @fileoverview bibsearch error hierarchy
 *
 * Typed, structured errors for the failure classes the coordinator knows how
 * to recover from (parse, remote, write-back) and for programming mistakes
 * (illegal status transitions).
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

export abstract class BibsearchError extends Error {
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
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigError extends BibsearchError {
  readonly code = 'CONFIG_ERROR';
  readonly retryable = false;

  constructor(
    readonly configPath: string,
    message: string,
    readonly issues: string[] = [],
  ) {
    super(`Invalid configuration in ${configPath}: ${message}`);
    this.name = 'ConfigError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configPath: this.configPath,
        issues: this.issues,
      },
    };
  }
}

// ============================================================================
// PARSE ERRORS
// ============================================================================

export class BibtexParseError extends BibsearchError {
  readonly code = 'BIBTEX_PARSE_ERROR';
  readonly retryable = false;

  constructor(
    readonly filePath: string,
    message: string,
  ) {
    super(`Failed to parse BibTeX from ${filePath}: ${message}`);
    this.name = 'BibtexParseError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        filePath: this.filePath,
      },
    };
  }
}

// ============================================================================
// REMOTE ERRORS
// ============================================================================

export type RemoteFailureReason = 'transport' | 'http_status' | 'decode' | 'timeout' | 'missing_entry';

export class RemoteSearchError extends BibsearchError {
  readonly code = 'REMOTE_SEARCH_ERROR';

  constructor(
    readonly endpoint: string,
    readonly reason: RemoteFailureReason,
    message: string,
  ) {
    super(`Remote ${endpoint} ${reason}: ${message}`);
    this.name = 'RemoteSearchError';
  }

  get retryable(): boolean {
    return this.reason === 'transport' || this.reason === 'timeout';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        endpoint: this.endpoint,
        reason: this.reason,
      },
    };
  }
}

// ============================================================================
// STATUS ERRORS
// ============================================================================

export class StatusTransitionError extends BibsearchError {
  readonly code = 'STATUS_TRANSITION_ERROR';
  readonly retryable = false;

  constructor(
    readonly source: string,
    readonly from: string,
    readonly to: string,
  ) {
    super(`Illegal status transition for ${source}: ${from} -> ${to}`);
    this.name = 'StatusTransitionError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { source: this.source, from: this.from, to: this.to },
    };
  }
}

// ============================================================================
// WRITE-BACK ERRORS
// ============================================================================

export type WriteBackFailure = 'unresolved_record' | 'ambiguous_target' | 'io';

export class WriteBackError extends BibsearchError {
  readonly code = 'WRITE_BACK_ERROR';
  readonly retryable = false;

  constructor(
    readonly target: string,
    readonly failure: WriteBackFailure,
    message: string,
  ) {
    super(`Cannot write ${target}: ${message}`);
    this.name = 'WriteBackError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        target: this.target,
        failure: this.failure,
      },
    };
  }
}

// ============================================================================
// ERROR TYPE GUARDS
// ============================================================================

export function isBibsearchError(error: unknown): error is BibsearchError {
  return error instanceof BibsearchError;
}
