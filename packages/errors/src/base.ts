import { ERROR_CATALOG, type ErrorCode } from "./catalog.js";

/**
 * Root of the error hierarchy.
 *
 * Catch generically with `instanceof PrivacyProbeError`, or discriminate on
 * `.code` for a specific condition.
 */
export abstract class PrivacyProbeError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: Error }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** From the catalog entry of `code` */
  get isExpected(): boolean {
    return ERROR_CATALOG[this.code].isExpected;
  }
}

/** Check if a value belongs to the privacy-probe error hierarchy */
export function isPrivacyProbeError(value: unknown): value is PrivacyProbeError {
  return value instanceof PrivacyProbeError;
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}

/**
 * One-line rendering for CLI output: `[CODE] message`, plus the cause's
 * message when it adds something.
 */
export function describeError(error: unknown): string {
  if (!(error instanceof PrivacyProbeError)) {
    return getErrorMessage(error);
  }
  const cause = error.cause instanceof Error ? error.cause.message : undefined;
  const suffix = cause && !error.message.includes(cause) ? ` (caused by: ${cause})` : "";
  return `[${error.code}] ${error.message}${suffix}`;
}
