// errors.ts - Error Types

import type { ErrorCategory, StageName } from './types';

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/** Base error class for all Zathras errors */
export class ZathrasError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    category: ErrorCategory,
    options?: {
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'ZathrasError';
    this.code = code;
    this.category = category;
    this.details = options?.details;
  }
}

/** Bad or missing run configuration. Always raised before any resource is created. */
export class ConfigurationError extends ZathrasError {
  constructor(
    message: string,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(options?.code ?? 'INVALID_CONFIG', message, 'validation', options);
    this.name = 'ConfigurationError';
  }
}

/** Malformed host descriptor string */
export class DescriptorParseError extends ConfigurationError {
  readonly fragment: string;
  readonly position: number;

  constructor(message: string, fragment: string, position: number) {
    super(`${message}: "${fragment}" (at offset ${position})`, {
      code: 'DESCRIPTOR_PARSE_ERROR',
      details: { fragment, position },
    });
    this.name = 'DescriptorParseError';
    this.fragment = fragment;
    this.position = position;
  }
}

/** Failure of a pipeline stage after provisioning (install, tests) */
export class StageError extends ZathrasError {
  readonly stage: StageName;

  constructor(
    stage: StageName,
    message: string,
    options?: {
      code?: string;
      category?: ErrorCategory;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(options?.code ?? 'STAGE_FAILED', message, options?.category ?? 'internal', options);
    this.name = 'StageError';
    this.stage = stage;
  }
}

/** A required install step failed */
export class InstallError extends StageError {
  readonly step: string;

  constructor(step: string, message: string, options?: { cause?: unknown }) {
    super('install', message, {
      code: 'INSTALL_FAILED',
      details: { step },
      cause: options?.cause,
    });
    this.name = 'InstallError';
    this.step = step;
  }
}

/** State conflict error (invalid state transition) */
export class ConflictError extends ZathrasError {
  constructor(
    message: string,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(options?.code ?? 'INVALID_STATE_TRANSITION', message, 'conflict', options);
    this.name = 'ConflictError';
  }
}

/** Timeout error */
export class TimeoutError extends ZathrasError {
  constructor(
    message: string,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(options?.code ?? 'OPERATION_TIMEOUT', message, 'timeout', options);
    this.name = 'TimeoutError';
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/** Extract a printable message from an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Reduce any thrown value to the { code, message } shape reported per system */
export function toErrorSummary(err: unknown): { code: string; message: string } {
  if (err instanceof ZathrasError) return { code: err.code, message: err.message };
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : 'INTERNAL_ERROR';
    return { code, message: err.message };
  }
  return { code: 'INTERNAL_ERROR', message: String(err) };
}
