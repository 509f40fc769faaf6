/**
 * nstest error taxonomy.
 *
 * Per-test problems become report events; the errors below either abort the
 * surrounding invocation (engine state, configuration) or mark a failed
 * assertion for the test invocation to pick up.
 */

export type ErrorDetails = Record<string, unknown>;

export class NsTestError extends Error {
  code: string;
  details?: ErrorDetails;

  constructor(code: string, message: string, details?: ErrorDetails) {
    super(message);
    this.name = "NsTestError";
    this.code = code;
    this.details = details;
  }
}

/**
 * The engine was driven without the state it needs. Always a programming
 * defect, never isolated per test.
 */
export class EngineStateError extends NsTestError {
  constructor(code: string, message: string, details?: ErrorDetails) {
    super(code, message, details);
    this.name = "EngineStateError";
  }
}

export class NoActiveEnvironmentError extends EngineStateError {
  constructor(operation: string) {
    super(
      "E_NO_ENV",
      `No active run environment for '${operation}'. Call setCurrent() or run through runTests().`,
      { operation }
    );
    this.name = "NoActiveEnvironmentError";
  }
}

/**
 * Malformed suite definition: raised while the suite is being built, so the
 * run never starts and no summary is produced.
 */
export class ConfigurationError extends NsTestError {
  constructor(code: string, message: string, details?: ErrorDetails) {
    super(code, message, details);
    this.name = "ConfigurationError";
  }
}

/**
 * Thrown by assertion helpers that abort the test body. Test invocation
 * reports it as a `fail` event rather than an `error`.
 */
export class AssertionFailure extends Error {
  readonly assertionFailure = true;
  expected?: unknown;
  actual?: unknown;

  constructor(message: string, expected?: unknown, actual?: unknown) {
    super(message);
    this.name = "AssertionFailure";
    this.expected = expected;
    this.actual = actual;
  }
}

export interface FailedAssertion {
  message?: string;
  expected?: unknown;
  actual?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Structural check for a failed assertion: our own marker, or the
 * `ERR_ASSERTION` code carried by node:assert's AssertionError.
 */
export function isAssertionFailure(value: unknown): value is FailedAssertion {
  if (!isRecord(value)) return false;
  return value["assertionFailure"] === true || value["code"] === "ERR_ASSERTION";
}

export function isFatal(e: unknown): e is EngineStateError | ConfigurationError {
  return e instanceof EngineStateError || e instanceof ConfigurationError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
