/**
 * MessagePack codec for the RPC protocol.
 */

import {
  encode,
  decodeMulti,
  decodeMultiStream,
  ExtensionCodec,
} from "@msgpack/msgpack";

/**
 * Encodes values to bytes and decodes byte streams back to values.
 * The client only depends on this interface.
 */
export interface FrameCodec {
  /** Encode one value (usually a frame array). */
  encode(value: unknown): Uint8Array;

  /**
   * Decode every complete value in a buffer.
   * @throws when the buffer is malformed or ends mid-value
   */
  decodeAll(data: Uint8Array): unknown[];

  /**
   * Decode values from a stream of chunks. Values may span chunk
   * boundaries and a chunk may hold several values. Errors thrown by the
   * source propagate unchanged; malformed input throws a decode error.
   */
  decodeStream(chunks: AsyncIterable<Uint8Array>): AsyncIterable<unknown>;
}

export interface CodecOptions {
  /**
   * Extension types for peer-specific values (remote object handles and
   * the like). Unregistered extensions decode to `ExtData`.
   */
  extensionCodec?: ExtensionCodec;
}

/**
 * Create a MessagePack codec.
 */
export function createMsgpackCodec(options: CodecOptions = {}): FrameCodec {
  const extensionCodec = options.extensionCodec ?? new ExtensionCodec();

  return {
    encode: (value) => encode(value, { extensionCodec }),
    decodeAll: (data) => Array.from(decodeMulti(data, { extensionCodec })),
    decodeStream: (chunks) => decodeMultiStream(chunks, { extensionCodec }),
  };
}

// Shared default instance
const defaultCodec = createMsgpackCodec();

// ============================================================================
// Encoding/Decoding Functions
// ============================================================================

/**
 * Encode any value to MessagePack bytes.
 */
export function encodeValue(value: unknown): Uint8Array {
  return defaultCodec.encode(value);
}

/**
 * Decode all MessagePack values in a buffer.
 */
export function decodeValues(data: Uint8Array): unknown[] {
  return defaultCodec.decodeAll(data);
}

export { defaultCodec };
