import { ErrorCodeName, type ErrorCode } from "./types.ts";

/**
 * Error surfaced to callers of the client. `code` matches the code on
 * the corresponding error event, when one is broadcast.
 */
export class RpcError extends Error {
  readonly code: ErrorCode;
  /** msgid of the call that failed, when the error belongs to one */
  readonly msgid?: number;

  constructor(
    code: ErrorCode,
    message: string,
    options: { msgid?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "RpcError";
    this.code = code;
    this.msgid = options.msgid;
  }

  get codeName(): string {
    return ErrorCodeName[this.code] ?? `Unknown(${this.code})`;
  }
}

/**
 * Check whether an error is an RpcError with the given code.
 */
export function isRpcError(error: unknown, code?: ErrorCode): error is RpcError {
  return (
    error instanceof RpcError && (code === undefined || error.code === code)
  );
}
