export const ErrorKinds = {
  malformedArchive: 'MalformedArchive',
  noSuchInteraction: 'NoSuchInteraction',
  noMatchingInteraction: 'NoMatchingInteraction',
  multipleActiveContexts: 'MultipleActiveContexts',
  persistenceIOFailure: 'PersistenceIOFailure',
  unsupportedOperation: 'UnsupportedOperation',
} as const;

export type ErrorKind = (typeof ErrorKinds)[keyof typeof ErrorKinds];

/**
 * Base class for every failure raised by the recorder.
 * Callers can assert on `kind` instead of matching messages.
 */
export class HttpRecorderError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class MalformedArchiveError extends HttpRecorderError {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(
      ErrorKinds.malformedArchive,
      `Malformed archive ${source}: ${issues.join('; ')}`,
    );
    this.issues = issues;
  }
}

export class NoSuchInteractionError extends HttpRecorderError {
  readonly interactionName: string;

  constructor(interactionName: string, location?: string) {
    super(
      ErrorKinds.noSuchInteraction,
      location
        ? `No recorded interaction "${interactionName}" at ${location}`
        : `No recorded interaction "${interactionName}"`,
    );
    this.interactionName = interactionName;
  }
}

export class NoMatchingInteractionError extends HttpRecorderError {
  readonly method: string;
  readonly url: string;
  readonly interactionName: string;

  constructor(interactionName: string, method: string, url: string) {
    super(
      ErrorKinds.noMatchingInteraction,
      `Unable to find a matching interaction for request ${method} ${url} in "${interactionName}"`,
    );
    this.interactionName = interactionName;
    this.method = method;
    this.url = url;
  }
}

export class MultipleActiveContextsError extends HttpRecorderError {
  readonly activeInteractionName: string;

  constructor(activeInteractionName: string) {
    super(
      ErrorKinds.multipleActiveContexts,
      `Cannot open multiple recorder contexts at the same time ("${activeInteractionName}" is still active)`,
    );
    this.activeInteractionName = activeInteractionName;
  }
}

export class PersistenceIOError extends HttpRecorderError {
  constructor(message: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(ErrorKinds.persistenceIOFailure, `${message}: ${detail}`, { cause });
  }
}

export class UnsupportedOperationError extends HttpRecorderError {
  constructor(message: string) {
    super(ErrorKinds.unsupportedOperation, message);
  }
}

export function isErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
