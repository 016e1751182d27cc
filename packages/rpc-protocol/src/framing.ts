/**
 * Frame builders and inbound frame classification.
 *
 * Building produces the array that the codec encodes; classification
 * takes one decoded value and tells the client what to do with it.
 */

import {
  MessageType,
  MessageTypeName,
  ErrorCode,
  FrameLength,
  MAX_MSGID,
  type RequestFrame,
  type InboundMessage,
  type InvalidMessage,
} from "./types.ts";

// ============================================================================
// Frame Building
// ============================================================================

/**
 * Build a request frame.
 */
export function buildRequest(
  msgid: number,
  method: string,
  params: unknown[]
): RequestFrame {
  return [MessageType.REQUEST, msgid, method, params];
}

// ============================================================================
// Frame Classification
// ============================================================================

/**
 * Check that a decoded value is a valid msgid (uint32).
 */
export function isMsgid(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_MSGID
  );
}

function invalid(
  code: ErrorCode,
  message: string,
  value: unknown
): InvalidMessage {
  return { kind: "invalid", code, message, value };
}

/**
 * Classify one decoded value as a response, a notification, or an
 * invalid message with the reason it was rejected.
 */
export function classifyMessage(value: unknown): InboundMessage {
  if (!Array.isArray(value)) {
    return invalid(
      ErrorCode.MALFORMED_MESSAGE,
      "Could not get the array from the message",
      value
    );
  }

  const frame: unknown[] = value;

  switch (frame[0]) {
    case MessageType.RESPONSE: {
      if (frame.length !== FrameLength.RESPONSE) {
        return invalid(
          ErrorCode.MALFORMED_RESPONSE,
          `Got an array of length ${frame.length} for a message type response`,
          value
        );
      }
      const msgid = frame[1];
      if (!isMsgid(msgid)) {
        return invalid(
          ErrorCode.MALFORMED_RESPONSE,
          "Could not get the msgid",
          value
        );
      }
      return { kind: "response", msgid, error: frame[2], result: frame[3] };
    }

    case MessageType.NOTIFICATION: {
      if (frame.length !== FrameLength.NOTIFICATION) {
        return invalid(
          ErrorCode.MALFORMED_NOTIFICATION,
          `Got an array of length ${frame.length} for a message type notification`,
          value
        );
      }
      const method = frame[1];
      const params = frame[2];
      if (typeof method !== "string" || !Array.isArray(params)) {
        return invalid(
          ErrorCode.MALFORMED_NOTIFICATION,
          "Could not get the method and params",
          value
        );
      }
      return { kind: "notification", method, params };
    }

    case MessageType.REQUEST:
      return invalid(
        ErrorCode.UNEXPECTED_REQUEST,
        "Got message type request from remote",
        value
      );

    default:
      return invalid(
        ErrorCode.MALFORMED_MESSAGE,
        "Could not get the type of the message",
        value
      );
  }
}

/**
 * Get the message type name for debugging.
 */
export function getMessageTypeName(type: number): string {
  return MessageTypeName[type] ?? `Unknown(${type})`;
}
