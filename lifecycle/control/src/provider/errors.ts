// provider/errors.ts - Provider Error Taxonomy

import type { SystemType } from "@zathras/contracts";

// =============================================================================
// Error Codes & Categories
// =============================================================================

export type ProviderOperationErrorCode =
  | "INFRA_APPLY_FAILED"
  | "INFRA_DESTROY_FAILED"
  | "UNREACHABLE"
  | "CPU_MISMATCH"
  | "SPOT_UNAVAILABLE"
  | "RESOURCE_GROUP_CONFLICT"
  | "CONNECTION_LOST"
  | "AUTH_ERROR"
  | "RATE_LIMIT_ERROR"
  | "TIMEOUT_ERROR"
  | "INVALID_SPEC"
  | "NOT_FOUND"
  | "PROVIDER_INTERNAL";

export type ProviderOperationErrorCategory =
  | "capacity"
  | "auth"
  | "rate_limit"
  | "validation"
  | "not_found"
  | "conflict"
  | "timeout"
  | "internal";

// =============================================================================
// Base Error Class
// =============================================================================

export abstract class ProviderOperationError extends Error {
  abstract readonly code: ProviderOperationErrorCode;
  abstract readonly category: ProviderOperationErrorCategory;
  abstract readonly retryable: boolean;
  abstract readonly retry_after_ms?: number;

  constructor(
    message: string,
    public readonly provider: SystemType,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

/** CPU model reported by the host did not contain the requested substring */
export class CpuMismatchError extends ProviderOperationError {
  readonly code = "CPU_MISMATCH" as const;
  readonly category = "capacity" as const;
  readonly retryable = true;
  readonly retry_after_ms = undefined;

  constructor(
    provider: SystemType,
    public readonly requested: string,
    public readonly actual: string
  ) {
    super(`CPU type mismatch: requested "${requested}", got "${actual}"`, provider, { requested, actual });
  }
}

/** Spot capacity could not be obtained at the current price tier */
export class SpotUnavailableError extends ProviderOperationError {
  readonly code = "SPOT_UNAVAILABLE" as const;
  readonly category = "capacity" as const;
  readonly retryable = true;
  readonly retry_after_ms = undefined;

  constructor(
    provider: SystemType,
    public readonly price: string,
    message?: string
  ) {
    super(message ?? `Spot request failed at price ${price}`, provider, { price });
  }
}

/** Account-level resource-group name collision */
export class ResourceGroupConflictError extends ProviderOperationError {
  readonly code = "RESOURCE_GROUP_CONFLICT" as const;
  readonly category = "conflict" as const;
  readonly retryable = true;
  readonly retry_after_ms = undefined;

  constructor(
    provider: SystemType,
    public readonly resourceGroup: string
  ) {
    super(`Resource group ${resourceGroup} already exists`, provider, { resourceGroup });
  }
}

export class AuthError extends ProviderOperationError {
  readonly code = "AUTH_ERROR" as const;
  readonly category = "auth" as const;
  readonly retryable = false;
  readonly retry_after_ms = undefined;

  constructor(
    provider: SystemType,
    public readonly reason: "invalid_credentials" | "expired" | "insufficient_permissions" | "missing_credentials",
    message?: string
  ) {
    super(message ?? `Authentication failed: ${reason}`, provider, { reason });
  }
}

// =============================================================================
// Generic Concrete Error
// =============================================================================

/**
 * Concrete provider error for use by all providers.
 * Providers pass their name and error details; no subclass needed.
 */
export class ConcreteProviderError extends ProviderOperationError {
  readonly code: ProviderOperationErrorCode;
  readonly category: ProviderOperationErrorCategory;
  readonly retryable: boolean;
  readonly retry_after_ms?: number;

  constructor(
    provider: SystemType,
    code: ProviderOperationErrorCode,
    message: string,
    options?: {
      retryable?: boolean;
      retry_after_ms?: number;
      details?: Record<string, unknown>;
    }
  ) {
    super(message, provider, options?.details);
    this.code = code;
    this.category = categorizeErrorCode(code);
    this.retryable = options?.retryable ?? false;
    this.retry_after_ms = options?.retry_after_ms;
  }
}

// =============================================================================
// Error Handling Helpers
// =============================================================================

export function mapProviderOperationError(
  provider: SystemType,
  error: unknown
): ProviderOperationError {
  if (error instanceof ProviderOperationError) return error;

  const message = error instanceof Error ? error.message : String(error);
  return new ConcreteProviderError(provider, "PROVIDER_INTERNAL", message, {
    details: { originalError: error },
  });
}

/**
 * Wrap an async provider operation with error mapping.
 * Catches non-ProviderOperationError exceptions and maps them using the
 * provided mapper function (or falls back to mapProviderOperationError).
 *
 * Usage:
 *   await withProviderErrorMapping("aws", async () => { ... }, mapEC2Error);
 */
export async function withProviderErrorMapping<T>(
  provider: SystemType,
  fn: () => Promise<T>,
  mapper?: (error: unknown) => ProviderOperationError,
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof ProviderOperationError) throw error;
    if (mapper) throw mapper(error);
    throw mapProviderOperationError(provider, error);
  }
}

export function categorizeErrorCode(code: ProviderOperationErrorCode): ProviderOperationErrorCategory {
  switch (code) {
    case "SPOT_UNAVAILABLE":
    case "CPU_MISMATCH":
      return "capacity";
    case "AUTH_ERROR":
      return "auth";
    case "RATE_LIMIT_ERROR":
      return "rate_limit";
    case "INVALID_SPEC":
      return "validation";
    case "NOT_FOUND":
      return "not_found";
    case "RESOURCE_GROUP_CONFLICT":
      return "conflict";
    case "TIMEOUT_ERROR":
      return "timeout";
    default:
      return "internal";
  }
}

/** Connection-level failures that may mean the instance went away */
export function isConnectionFailure(error: unknown): boolean {
  return error instanceof ProviderOperationError &&
    (error.code === "CONNECTION_LOST" || error.code === "UNREACHABLE");
}
