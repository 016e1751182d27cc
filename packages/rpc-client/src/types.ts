/**
 * Types for the MessagePack-RPC client.
 */

import type { FrameCodec, Response, RpcEvent } from "@mpack-rpc/protocol";
import type { ByteStreamConnector } from "./transport.ts";
import type { EventStream } from "./event-stream.ts";

export type { Response, RpcEvent };

export type Logger = Pick<Console, "debug" | "warn" | "error">;

/**
 * Options for creating a client.
 */
export interface ClientOptions {
  /** Byte-stream connector (defaults to `node:net` sockets) */
  connector?: ByteStreamConnector;
  /** Value codec (defaults to MessagePack) */
  codec?: FrameCodec;
  /** Mirror every response onto `events` */
  streamResponses?: boolean;
  /** First msgid to allocate */
  initialMsgid?: number;
  /** Defaults to `console` */
  logger?: Logger;
}

export interface RequestOptions {
  /** Reject with a TIMEOUT error after this many ms */
  timeout?: number;
}

/**
 * A MessagePack-RPC client over one connection.
 */
export interface RpcClient {
  /**
   * Connect and start reading.
   * @param address - Unix socket path, or `tcp://host:port`
   */
  start(address: string): Promise<void>;

  /**
   * Complete `events`, resolve every pending call with the neutral
   * response and close the connection. The client cannot be started again.
   */
  stop(): Promise<void>;

  /**
   * Send a request. When `expectsResult` is false, resolves with the
   * neutral response as soon as the frame is written.
   */
  call(
    method: string,
    params: unknown[],
    expectsResult: boolean
  ): Promise<Response>;

  /** `call(method, params, true)` with an optional timeout. */
  request(
    method: string,
    params?: unknown[],
    options?: RequestOptions
  ): Promise<Response>;

  /** `call(method, params, false)`. */
  notify(method: string, params?: unknown[]): Promise<Response>;

  /** Notifications, protocol errors and (when mirroring) responses. */
  readonly events: EventStream<RpcEvent>;

  /** Whether responses are mirrored onto `events`. */
  streamResponses: boolean;

  isRunning(): boolean;

  /** Number of calls awaiting a response. */
  pendingCount(): number;
}
