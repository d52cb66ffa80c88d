/**
 * Typed error hierarchy for axwarm
 *
 * Only PermissionDeniedError and DirectoryUnavailableError abort a run;
 * per-target problems are recorded as outcomes, never thrown.
 */

/**
 * Base error class for all axwarm errors
 */
export class AxWarmError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: number = 1
  ) {
    super(message);
    this.name = 'AxWarmError';
    // Preserve stack trace (V8 engines)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * The current process is not trusted for accessibility access
 */
export class PermissionDeniedError extends AxWarmError {
  constructor() {
    super(
      'Accessibility permission not granted.\n' +
        'Grant access: System Settings → Privacy & Security → Accessibility\n' +
        'Add and enable your terminal application (or the Node.js binary running axwarm).',
      'PERMISSION_DENIED'
    );
    this.name = 'PermissionDeniedError';
  }
}

/**
 * The running-application list could not be queried
 */
export class DirectoryUnavailableError extends AxWarmError {
  constructor(reason: string) {
    super(`Could not list running applications: ${reason}`, 'DIRECTORY_UNAVAILABLE');
    this.name = 'DirectoryUnavailableError';
  }
}

/**
 * Explicitly requested name fragments matched no warm-up target
 */
export class NoMatchError extends AxWarmError {
  constructor(
    public readonly fragments: readonly string[],
    public readonly skippedCount: number = 0
  ) {
    const suffix =
      skippedCount > 0 ? ` (${skippedCount} helper process${skippedCount === 1 ? '' : 'es'} skipped)` : '';
    super(`No running applications found matching: ${fragments.join(', ')}${suffix}`, 'NO_MATCH');
    this.name = 'NoMatchError';
  }
}

/**
 * The accessibility bridge process failed
 */
export class BridgeError extends AxWarmError {
  constructor(
    message: string,
    public readonly status?: number | string,
    public readonly stderr?: string
  ) {
    super(message, 'BRIDGE_ERROR');
    this.name = 'BridgeError';
  }
}

/**
 * The binding does not speak the requested attribute-read calling convention.
 * Callers retry with the other convention instead of treating this as a failure.
 */
export class ConventionMismatchError extends AxWarmError {
  constructor(public readonly convention: string) {
    super(`Binding does not support the ${convention} calling convention`, 'CONVENTION_MISMATCH');
    this.name = 'ConventionMismatchError';
  }
}

/**
 * Invalid command-line input
 */
export class UsageError extends AxWarmError {
  constructor(message: string) {
    super(message, 'USAGE');
    this.name = 'UsageError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
