/**
 * Error codes raised by fleetgov.
 * Configuration and usage errors are user-correctable (CLI exit code 2).
 */
export type ErrorCode =
  | 'ConfigMissing'
  | 'ConfigInvalid'
  | 'UsageError'
  | 'UnknownMode'
  | 'StampUnreadable';

export interface FleetErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown> | string;
}

/**
 * Base error class carrying a classification code.
 *
 * @example
 * ```typescript
 * throw new ConfigInvalidError('repos[0].name: Required', {
 *   details: { path: '/hub/fleet.config.json' },
 * });
 * ```
 */
export class FleetError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown> | string;
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: FleetErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/** No hub configuration file was found. Fatal: nothing is evaluated. */
export class ConfigMissingError extends FleetError {
  constructor(message: string, options: FleetErrorOptions = {}) {
    super('ConfigMissing', message, options);
  }
}

/** The configuration file exists but does not parse or validate. */
export class ConfigInvalidError extends FleetError {
  constructor(message: string, options: FleetErrorOptions = {}) {
    super('ConfigInvalid', message, options);
  }
}

export class UsageError extends FleetError {
  constructor(message: string, options: FleetErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/** A stamp carries a mode outside the build/prod lattice. */
export class UnknownModeError extends FleetError {
  constructor(
    public readonly mode: string,
    options: FleetErrorOptions = {},
  ) {
    super('UnknownMode', `Unknown validation mode "${mode}" (expected "build" or "prod")`, options);
  }
}

export class StampUnreadableError extends FleetError {
  constructor(message: string, options: FleetErrorOptions = {}) {
    super('StampUnreadable', message, options);
  }
}

export function isUserError(err: unknown): boolean {
  return err instanceof FleetError
    && (err.code === 'ConfigMissing' || err.code === 'ConfigInvalid' || err.code === 'UsageError');
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
