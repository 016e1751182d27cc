/**
 * Message types for the MessagePack-RPC protocol.
 *
 * Every frame is a single MessagePack array:
 * ┌──────────────────┬────────────────────────────────────┐
 * │ Request (0)      │ [0, msgid, method, params]         │
 * │ Response (1)     │ [1, msgid, error, result]          │
 * │ Notification (2) │ [2, method, params]                │
 * └──────────────────┴────────────────────────────────────┘
 *
 * There is no length prefix; frames are delimited by the MessagePack
 * encoding itself.
 */

// ============================================================================
// Message Type Constants
// ============================================================================

export const MessageType = {
  REQUEST: 0,
  RESPONSE: 1,
  NOTIFICATION: 2,
} as const;

export type MessageType = (typeof MessageType)[keyof typeof MessageType];

/** Reverse lookup for message type names */
export const MessageTypeName: Record<number, string> = Object.fromEntries(
  Object.entries(MessageType).map(([k, v]) => [v, k])
);

/** Number of elements in each frame kind */
export const FrameLength = {
  REQUEST: 4,
  RESPONSE: 4,
  NOTIFICATION: 3,
} as const;

/** Largest msgid; ids wrap to 0 after this. */
export const MAX_MSGID = 0xffffffff;

// ============================================================================
// Error Codes
// ============================================================================

export const ErrorCode = {
  // Protocol errors (recoverable unless noted)
  MALFORMED_MESSAGE: 1001,
  MALFORMED_RESPONSE: 1002,
  MALFORMED_NOTIFICATION: 1003,
  UNEXPECTED_REQUEST: 1004,
  /** Fatal: the byte stream could not be decoded */
  UNPARSABLE_DATA: 1005,

  // Connection errors
  CONNECTION_LOST: 5001,
  CONNECT_FAILED: 5002,
  NOT_CONNECTED: 5003,
  SHORT_WRITE: 5004,
  WRITE_FAILED: 5005,
  ALREADY_RUNNING: 5006,
  CLIENT_CLOSED: 5007,
  TIMEOUT: 5008,
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Reverse lookup for error code names */
export const ErrorCodeName: Record<number, string> = Object.fromEntries(
  Object.entries(ErrorCode).map(([k, v]) => [v, k])
);

// ============================================================================
// Frames
// ============================================================================

export type RequestFrame = [
  type: typeof MessageType.REQUEST,
  msgid: number,
  method: string,
  params: unknown[],
];

export type ResponseFrame = [
  type: typeof MessageType.RESPONSE,
  msgid: number,
  error: unknown,
  result: unknown,
];

export type NotificationFrame = [
  type: typeof MessageType.NOTIFICATION,
  method: string,
  params: unknown[],
];

// ============================================================================
// Decoded Messages
// ============================================================================

/**
 * Result of a call. A call that never gets a real answer (no result
 * expected, or the connection was torn down) resolves with the neutral
 * response: `error` and `result` both `null`.
 */
export interface Response {
  msgid: number;
  error: unknown;
  result: unknown;
}

export interface ResponseMessage extends Response {
  kind: "response";
}

export interface NotificationMessage {
  kind: "notification";
  method: string;
  params: unknown[];
}

/** A decoded value that is not a frame this client can act on. */
export interface InvalidMessage {
  kind: "invalid";
  code: ErrorCode;
  message: string;
  /** The decoded value as received */
  value: unknown;
}

export type InboundMessage =
  | ResponseMessage
  | NotificationMessage
  | InvalidMessage;

// ============================================================================
// Events
// ============================================================================

export interface NotificationEvent {
  type: "notification";
  method: string;
  params: unknown[];
}

export interface ResponseEvent {
  type: "response";
  msgid: number;
  error: unknown;
  result: unknown;
}

export interface ErrorEvent {
  type: "error";
  code: ErrorCode;
  message: string;
  /** Offending decoded value, or null when there is none */
  value: unknown;
  cause?: unknown;
}

/**
 * Events broadcast by a client. Responses appear only while response
 * mirroring is on.
 */
export type RpcEvent = NotificationEvent | ResponseEvent | ErrorEvent;

/**
 * Build the neutral response for a msgid.
 */
export function nilResponse(msgid: number): Response {
  return { msgid, error: null, result: null };
}
