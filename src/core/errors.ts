// Loopwise error types

/** Invalid or incomplete process configuration. Fatal at startup. */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/** A store-only operation was requested but no store is attached. */
export class PersistenceUnavailableError extends Error {
  constructor() {
    super('Database not available');
    this.name = 'PersistenceUnavailableError';
  }
}

/** A second turn was started on a conversation whose turn is still running. */
export class TurnInProgressError extends Error {
  constructor() {
    super('A turn is already in progress for this conversation');
    this.name = 'TurnInProgressError';
  }
}

/** A saved conversation history could not be read back. */
export class HistoryFileError extends Error {
  readonly issues: string[];

  constructor(path: string, issues: string[]) {
    super(`Invalid history file ${path}: ${issues.join('; ')}`);
    this.name = 'HistoryFileError';
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
