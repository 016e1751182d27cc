/**
 * @mpack-rpc/protocol
 *
 * Protocol definitions, codec, and frame classification for MessagePack-RPC.
 */

// Types and utilities
export * from "./types.ts";

// Codec
export {
  createMsgpackCodec,
  encodeValue,
  decodeValues,
  defaultCodec,
  type FrameCodec,
  type CodecOptions,
} from "./codec.ts";

// Framing
export {
  buildRequest,
  classifyMessage,
  isMsgid,
  getMessageTypeName,
} from "./framing.ts";

// Errors
export { RpcError, isRpcError } from "./errors.ts";
