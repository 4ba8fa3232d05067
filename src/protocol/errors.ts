// src/protocol/errors.ts
// Error taxonomy of the protocol engine. None of these ever close a device connection.

export type ProtocolErrorCode = "FORMAT" | "LENGTH_MISMATCH" | "UNKNOWN_COMMAND" | "STORE";

export class ProtocolError extends Error {
  code: ProtocolErrorCode;

  constructor(message: string, code: ProtocolErrorCode) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Bad bracket or `*` field structure, or an unreadable length field */
export class FormatError extends ProtocolError {
  constructor(message: string) {
    super(message, "FORMAT");
  }
}

export class LengthMismatchError extends ProtocolError {
  declaredLength: number;
  actualLength: number;

  constructor(declaredLength: number, actualLength: number) {
    super(`Declared length ${declaredLength} does not match content length ${actualLength}`, "LENGTH_MISMATCH");
    this.declaredLength = declaredLength;
    this.actualLength = actualLength;
  }
}

/** Not fatal: the frame is still stored through its baseline record */
export class UnknownCommandError extends ProtocolError {
  token: string;

  constructor(token: string) {
    super(`Unknown command: ${token}`, "UNKNOWN_COMMAND");
    this.token = token;
  }
}

export class StoreError extends ProtocolError {
  cause: unknown;

  constructor(message: string, cause?: unknown) {
    super(message, "STORE");
    this.cause = cause;
  }
}

export const describeError = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
