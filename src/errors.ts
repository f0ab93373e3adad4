export type StopwatchErrorCode =
  | "InvalidState"
  | "NoActiveSplit"
  | "CapacityExceeded"
  | "InvalidReference"
  | "ExportIOFailure";

/**
 * A rejected command. The session is left exactly as it was before the command,
 * so callers report the message and carry on.
 */
export class StopwatchError extends Error {
  readonly code: StopwatchErrorCode;

  constructor(code: StopwatchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StopwatchError";
    this.code = code;
  }
}

export function isStopwatchError(error: unknown): error is StopwatchError {
  return error instanceof StopwatchError;
}
