/**
 * Connection handling for the MessagePack-RPC client.
 */

import {
  buildRequest,
  classifyMessage,
  defaultCodec,
  nilResponse,
  ErrorCode,
  RpcError,
  type FrameCodec,
  type Response,
  type ResponseMessage,
  type RpcEvent,
} from "@mpack-rpc/protocol";
import { createCorrelationTable, type CorrelationTable } from "./correlation.ts";
import { createEventSource, type EventSource } from "./event-stream.ts";
import { createReadWriteLock, type ReadWriteLock } from "./lock.ts";
import { createSocketConnector, type ByteStreamConnector } from "./transport.ts";
import { withTimeout } from "./timeout.ts";
import type { ClientOptions, Logger, RpcClient } from "./types.ts";

interface ClientState {
  connector: ByteStreamConnector;
  codec: FrameCodec;
  logger: Logger;
  /** Guards running/handle; calls hold it shared, lifecycle exclusively */
  lock: ReadWriteLock;
  table: CorrelationTable;
  events: EventSource<RpcEvent>;
  running: boolean;
  /** Set by stop(); the client cannot be started again */
  closed: boolean;
  handle: unknown;
  reader: Promise<void> | null;
  /** Tail of the write queue */
  writes: Promise<void>;
  streamResponses: boolean;
}

/** Thrown out of the chunk source so read failures are told apart from decode failures. */
class ConnectionReadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectionReadError";
  }
}

/**
 * Create a client. Call `start` to connect.
 */
export function createClient(options: ClientOptions = {}): RpcClient {
  const logger = options.logger ?? console;

  const state: ClientState = {
    connector: options.connector ?? createSocketConnector(),
    codec: options.codec ?? defaultCodec,
    logger,
    lock: createReadWriteLock(),
    table: createCorrelationTable(options.initialMsgid),
    events: createEventSource<RpcEvent>({
      onObserverError: (err) => logger.error("Event observer threw:", err),
    }),
    running: false,
    closed: false,
    handle: null,
    reader: null,
    writes: Promise.resolve(),
    streamResponses: options.streamResponses ?? false,
  };

  const call = (method: string, params: unknown[], expectsResult: boolean) =>
    sendRequest(state, method, params, expectsResult);

  return {
    start: (address) => start(state, address),
    stop: () => stop(state),
    call,
    request: (method, params = [], requestOptions = {}) => {
      const response = call(method, params, true);
      const { timeout } = requestOptions;
      if (timeout === undefined) {
        return response;
      }
      return withTimeout(
        response,
        timeout,
        () =>
          new RpcError(
            ErrorCode.TIMEOUT,
            `Request ${method} timed out after ${timeout}ms`
          )
      );
    },
    notify: (method, params = []) => call(method, params, false),
    events: state.events.stream,
    get streamResponses() {
      return state.streamResponses;
    },
    set streamResponses(value: boolean) {
      state.streamResponses = value;
    },
    isRunning: () => state.running,
    pendingCount: () => state.table.size(),
  };
}

// ============================================================================
// Lifecycle
// ============================================================================

async function start(state: ClientState, address: string): Promise<void> {
  await state.lock.withWriteLock(async () => {
    if (state.closed) {
      throw new RpcError(
        ErrorCode.CLIENT_CLOSED,
        "Client has been stopped and cannot be started again"
      );
    }
    if (state.running) {
      throw new RpcError(
        ErrorCode.ALREADY_RUNNING,
        `Already connected, cannot connect to ${address}`
      );
    }

    let handle: unknown;
    try {
      handle = await state.connector.connect(address);
    } catch (err) {
      const message = `Could not connect to ${address}`;
      state.logger.error(message, err);
      state.events.emit({
        type: "error",
        code: ErrorCode.CONNECT_FAILED,
        message,
        value: null,
        cause: err,
      });
      throw new RpcError(ErrorCode.CONNECT_FAILED, message, { cause: err });
    }

    state.handle = handle;
    state.running = true;
    state.writes = Promise.resolve();
    state.reader = runReader(state, handle);
    state.logger.debug(`Connected to ${address}`);
  });
}

async function stop(state: ClientState): Promise<void> {
  const reader = await state.lock.withWriteLock(async () => {
    state.events.complete();
    state.closed = true;

    const reader = state.reader;
    state.reader = null;

    const wasRunning = state.running;
    await teardown(state);
    if (wasRunning) {
      state.logger.debug("Connection stopped");
    }
    return reader;
  });

  // The reader exits once it sees the handle is gone
  if (reader) {
    await reader;
  }
}

/**
 * Resolve pending calls, mark stopped and close the handle. Must be called
 * with the lock held exclusively.
 */
async function teardown(state: ClientState): Promise<void> {
  state.table.drain();
  state.running = false;

  const handle = state.handle;
  state.handle = null;
  if (handle === null) {
    return;
  }

  try {
    await state.connector.close(handle);
  } catch (err) {
    state.logger.error("Error closing connection:", err);
  }
}

function isCurrent(state: ClientState, handle: unknown): boolean {
  return state.running && state.handle === handle;
}

// ============================================================================
// Requests
// ============================================================================

async function sendRequest(
  state: ClientState,
  method: string,
  params: unknown[],
  expectsResult: boolean
): Promise<Response> {
  const msgid = state.table.allocate();
  const packed = state.codec.encode(buildRequest(msgid, method, params));

  // Wait for the response outside the lock so stop() is never blocked by it
  const sent = await state.lock.withReadLock(() =>
    transmit(state, msgid, packed, expectsResult)
  );
  return sent.response;
}

async function transmit(
  state: ClientState,
  msgid: number,
  packed: Uint8Array,
  expectsResult: boolean
): Promise<{ response: Promise<Response> }> {
  if (!state.running) {
    throw new RpcError(
      ErrorCode.NOT_CONNECTED,
      `Connection stopped, but trying to send a request with msgid ${msgid}`,
      { msgid }
    );
  }

  const handle = state.handle;
  if (handle === null) {
    throw new RpcError(
      ErrorCode.NOT_CONNECTED,
      `Socket is invalid, but trying to send a request with msgid ${msgid}`,
      { msgid }
    );
  }

  // Registered before the write so a fast response always finds its entry
  const response = expectsResult
    ? state.table.register(msgid)
    : Promise.resolve(nilResponse(msgid));

  let written: number;
  try {
    written = await enqueueWrite(state, handle, packed);
  } catch (err) {
    state.table.discard(msgid);
    const message = `Could not write to socket for msgid ${msgid}`;
    state.events.emit({
      type: "error",
      code: ErrorCode.WRITE_FAILED,
      message,
      value: null,
      cause: err,
    });
    throw new RpcError(ErrorCode.WRITE_FAILED, message, { msgid, cause: err });
  }

  if (written < packed.length) {
    state.table.discard(msgid);
    throw new RpcError(
      ErrorCode.SHORT_WRITE,
      `(Written) = ${written} < ${packed.length} = (requested) for msgid ${msgid}`,
      { msgid }
    );
  }

  return { response };
}

/**
 * Queue a write behind every earlier one so frames never interleave.
 */
function enqueueWrite(
  state: ClientState,
  handle: unknown,
  data: Uint8Array
): Promise<number> {
  const write = state.writes.then(() => state.connector.write(handle, data));
  // Each caller observes its own failure through `write`
  state.writes = write.then(
    () => undefined,
    () => undefined
  );
  return write;
}

// ============================================================================
// Reading
// ============================================================================

async function* readChunks(
  state: ClientState,
  handle: unknown
): AsyncGenerator<Uint8Array> {
  while (isCurrent(state, handle)) {
    let chunk: Uint8Array | null;
    try {
      chunk = await state.connector.read(handle);
    } catch (err) {
      if (!isCurrent(state, handle)) return;
      throw new ConnectionReadError("Could not read from socket", { cause: err });
    }

    if (!isCurrent(state, handle)) return;
    if (chunk === null) {
      throw new ConnectionReadError("Connection closed by remote");
    }
    yield chunk;
  }
}

async function runReader(state: ClientState, handle: unknown): Promise<void> {
  try {
    for await (const value of state.codec.decodeStream(readChunks(state, handle))) {
      if (!isCurrent(state, handle)) break;
      handleMessage(state, value);
    }
  } catch (err) {
    if (err instanceof ConnectionReadError) {
      await fail(state, handle, ErrorCode.CONNECTION_LOST, err.message, err.cause ?? err);
    } else {
      await fail(
        state,
        handle,
        ErrorCode.UNPARSABLE_DATA,
        "Data from socket could not be unpacked",
        err
      );
    }
  }
}

/**
 * Broadcast a fatal error and tear the connection down, unless stop() or
 * a newer connection got there first.
 */
async function fail(
  state: ClientState,
  handle: unknown,
  code: ErrorCode,
  message: string,
  cause: unknown
): Promise<void> {
  await state.lock.withWriteLock(async () => {
    if (!isCurrent(state, handle)) return;

    state.logger.error(message, cause);
    state.events.emit({ type: "error", code, message, value: null, cause });
    await teardown(state);
  });
}

/**
 * Handle one decoded value from the peer.
 */
function handleMessage(state: ClientState, value: unknown): void {
  const message = classifyMessage(value);

  switch (message.kind) {
    case "response":
      handleResponse(state, message);
      break;

    case "notification":
      state.events.emit({
        type: "notification",
        method: message.method,
        params: message.params,
      });
      break;

    case "invalid":
      state.logger.warn(`Dropping message: ${message.message}`);
      state.events.emit({
        type: "error",
        code: message.code,
        message: message.message,
        value: message.value,
      });
      break;
  }
}

function handleResponse(state: ClientState, message: ResponseMessage): void {
  const { msgid, error, result } = message;

  if (state.streamResponses) {
    state.events.emit({ type: "response", msgid, error, result });
  }

  // Unknown msgids were already resolved (e.g. at teardown) or never registered
  state.table.settle({ msgid, error, result });
}
