// Error taxonomy for the scanner
//
//   ConfigurationError — missing/invalid settings or rejected credentials. Fatal at startup.
//   DataSourceError    — exchange call failed. The cycle is abandoned and retried after backoff.
//   PersistenceError   — state/trades write failed. The previous file stays intact.
//
// Malformed numbers from the exchange are NOT errors: they parse to 0 (see util/numbers).

export type ErrorContext = Record<string, unknown>;

export class AppError extends Error {
  public readonly code: string;
  public readonly context?: ErrorContext;

  constructor(message: string, code: string = "APP_ERROR", context?: ErrorContext) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

export class ConfigurationError extends AppError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, "CONFIGURATION_ERROR", issues.length ? { issues } : undefined);
    this.issues = issues;
  }
}

export class DataSourceError extends AppError {
  public readonly endpoint: string;
  public readonly status?: number;

  constructor(message: string, endpoint: string, status?: number, context?: ErrorContext) {
    super(message, "DATA_SOURCE_ERROR", { endpoint, status, ...context });
    this.endpoint = endpoint;
    this.status = status;
  }
}

export class PersistenceError extends AppError {
  public readonly path: string;

  constructor(message: string, path: string, context?: ErrorContext) {
    super(message, "PERSISTENCE_ERROR", { path, ...context });
    this.path = path;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Only configuration problems stop the process; everything else is retried next cycle. */
export function isFatal(err: unknown): boolean {
  return err instanceof ConfigurationError;
}
