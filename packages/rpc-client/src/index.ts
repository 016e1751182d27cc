/**
 * @mpack-rpc/client
 *
 * MessagePack-RPC client over Unix domain or TCP sockets.
 */

export { createClient } from "./connection.ts";
export {
  createSocketConnector,
  parseAddress,
  type ByteStreamConnector,
  type SocketConnectorOptions,
  type SocketHandle,
} from "./transport.ts";
export {
  createEventSource,
  type EventStream,
  type EventSource,
  type EventObserver,
  type EventSourceOptions,
} from "./event-stream.ts";
export {
  createCorrelationTable,
  allocateMsgid,
  type CorrelationTable,
} from "./correlation.ts";
export { createReadWriteLock, type ReadWriteLock } from "./lock.ts";
export { withTimeout } from "./timeout.ts";
export type {
  ClientOptions,
  RequestOptions,
  RpcClient,
  Logger,
  Response,
  RpcEvent,
} from "./types.ts";
export { RpcError, isRpcError, ErrorCode } from "@mpack-rpc/protocol";
