export class InspectorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "InspectorError";
  }
}

/** Missing or malformed arguments or environment settings. */
export class UsageError extends InspectorError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "UsageError";
  }
}

export class FileReadError extends InspectorError {
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Unable to read ${path}: ${describeCause(cause)}`, { cause });
    this.name = "FileReadError";
    this.path = path;
  }
}

export interface RemoteCallErrorDetails {
  reason: string;
  code?: number;
  cause?: unknown;
}

/**
 * Failure of the inspectContent call: authentication, quota, a rejected
 * request, transport or service unavailability. `code` is the gRPC status
 * when the client library reported one.
 */
export class RemoteCallError extends InspectorError {
  public readonly reason: string;
  public readonly code?: number;

  constructor(message: string, details: RemoteCallErrorDetails) {
    super(message, { cause: details.cause });
    this.name = "RemoteCallError";
    this.reason = details.reason;
    this.code = details.code;
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
