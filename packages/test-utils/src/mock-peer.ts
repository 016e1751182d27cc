import {
  defaultCodec,
  isMsgid,
  FrameLength,
  MessageType,
  type FrameCodec,
  type NotificationFrame,
  type ResponseFrame,
} from "@mpack-rpc/protocol";
import type { ByteStreamConnector } from "@mpack-rpc/client";

/**
 * A request frame written by the client, as decoded by the peer.
 */
export interface RecordedRequest {
  msgid: number;
  method: string;
  params: unknown[];
}

/**
 * Connection state on the peer side of an in-memory connection.
 */
export interface MockHandle {
  id: number;
  address: string;
  inbox: Uint8Array[];
  waiters: Array<{
    resolve: (chunk: Uint8Array | null) => void;
    reject: (error: Error) => void;
  }>;
  ended: boolean;
  closed: boolean;
  failure: Error | null;
}

export interface MockPeerOptions {
  codec?: FrameCodec;
}

export interface MockPeer {
  /** Connector to hand to the client */
  connector: ByteStreamConnector<MockHandle>;
  /** Addresses the client connected to, in order */
  getConnections(): string[];
  /** Whether the latest connection is open */
  isConnected(): boolean;
  /** Every request the client has written */
  getRequests(): RecordedRequest[];
  clearRequests(): void;
  /** Resolve once at least `count` requests have been written. */
  waitForRequests(count: number): Promise<RecordedRequest[]>;
  /** Encode a value and deliver it to the client as one chunk. */
  send(value: unknown): void;
  /** Deliver raw bytes to the client. */
  sendBytes(bytes: Uint8Array): void;
  respond(msgid: number, error: unknown, result: unknown): void;
  notify(method: string, params: unknown[]): void;
  /** Fail the client's pending and future reads. */
  failRead(error?: Error): void;
  /** End the stream, as if the peer closed the socket. */
  end(): void;
  /** Make the next connect() reject with `error`. */
  failNextConnect(error: Error): void;
  /** Make writes reject with `error`, or succeed again with null. */
  failWrites(error: Error | null): void;
  /** Report at most `bytes` written per write, or lift the limit with null. */
  limitWrites(bytes: number | null): void;
}

function toRequest(frame: unknown): RecordedRequest | null {
  if (!Array.isArray(frame) || frame.length !== FrameLength.REQUEST) {
    return null;
  }
  const items: unknown[] = frame;
  const [type, msgid, method, params] = items;
  if (
    type !== MessageType.REQUEST ||
    !isMsgid(msgid) ||
    typeof method !== "string" ||
    !Array.isArray(params)
  ) {
    return null;
  }
  return { msgid, method, params };
}

/**
 * Create an in-memory peer for client tests.
 *
 * @example
 * const peer = createMockPeer();
 * const client = createClient({ connector: peer.connector });
 * await client.start("/tmp/test.sock");
 *
 * const pending = client.request("add", [1, 2]);
 * const [request] = await peer.waitForRequests(1);
 * peer.respond(request.msgid, null, 3);
 *
 * const response = await pending; // { msgid: 0, error: null, result: 3 }
 */
export function createMockPeer(options: MockPeerOptions = {}): MockPeer {
  const codec = options.codec ?? defaultCodec;
  const connections: string[] = [];
  const requests: RecordedRequest[] = [];
  const requestWaiters: Array<{ count: number; resolve: () => void }> = [];

  let current: MockHandle | null = null;
  let nextHandleId = 1;
  let connectFailure: Error | null = null;
  let writeFailure: Error | null = null;
  let writeLimit: number | null = null;

  function record(data: Uint8Array): void {
    for (const frame of codec.decodeAll(data)) {
      const request = toRequest(frame);
      if (!request) {
        throw new Error(`Peer received a value that is not a request: ${JSON.stringify(frame)}`);
      }
      requests.push(request);
    }

    for (const waiter of [...requestWaiters]) {
      if (requests.length >= waiter.count) {
        requestWaiters.splice(requestWaiters.indexOf(waiter), 1);
        waiter.resolve();
      }
    }
  }

  function deliver(chunk: Uint8Array): void {
    const handle = current;
    if (!handle || handle.closed || handle.ended) {
      throw new Error("Peer is not connected");
    }
    const waiter = handle.waiters.shift();
    if (waiter) {
      waiter.resolve(chunk);
    } else {
      handle.inbox.push(chunk);
    }
  }

  function finish(handle: MockHandle): void {
    for (const waiter of handle.waiters.splice(0)) {
      waiter.resolve(null);
    }
  }

  const connector: ByteStreamConnector<MockHandle> = {
    async connect(address) {
      connections.push(address);
      if (connectFailure) {
        const error = connectFailure;
        connectFailure = null;
        throw error;
      }
      current = {
        id: nextHandleId++,
        address,
        inbox: [],
        waiters: [],
        ended: false,
        closed: false,
        failure: null,
      };
      return current;
    },

    read(handle) {
      if (handle.inbox.length > 0) {
        const [chunk] = handle.inbox.splice(0, 1);
        return Promise.resolve(chunk);
      }
      if (handle.failure) {
        return Promise.reject(handle.failure);
      }
      if (handle.ended || handle.closed) {
        return Promise.resolve(null);
      }
      return new Promise((resolve, reject) => {
        handle.waiters.push({ resolve, reject });
      });
    },

    async write(handle, data) {
      if (handle.closed) {
        throw new Error("Connection is closed");
      }
      if (writeFailure) {
        throw writeFailure;
      }
      if (writeLimit !== null && data.length > writeLimit) {
        return writeLimit;
      }
      record(data);
      return data.length;
    },

    async close(handle) {
      handle.closed = true;
      finish(handle);
    },
  };

  return {
    connector,
    getConnections: () => [...connections],
    isConnected: () => current !== null && !current.closed && !current.ended,
    getRequests: () => [...requests],
    clearRequests() {
      requests.length = 0;
    },

    waitForRequests(count) {
      if (requests.length >= count) {
        return Promise.resolve([...requests]);
      }
      return new Promise((resolve) => {
        requestWaiters.push({ count, resolve: () => resolve([...requests]) });
      });
    },

    send(value) {
      deliver(codec.encode(value));
    },

    sendBytes(bytes) {
      deliver(bytes);
    },

    respond(msgid, error, result) {
      const frame: ResponseFrame = [MessageType.RESPONSE, msgid, error, result];
      deliver(codec.encode(frame));
    },

    notify(method, params) {
      const frame: NotificationFrame = [MessageType.NOTIFICATION, method, params];
      deliver(codec.encode(frame));
    },

    failRead(error = new Error("Connection reset by peer")) {
      const handle = current;
      if (!handle) {
        throw new Error("Peer is not connected");
      }
      handle.failure = error;
      for (const waiter of handle.waiters.splice(0)) {
        waiter.reject(error);
      }
    },

    end() {
      const handle = current;
      if (!handle) {
        throw new Error("Peer is not connected");
      }
      handle.ended = true;
      finish(handle);
    },

    failNextConnect(error) {
      connectFailure = error;
    },

    failWrites(error) {
      writeFailure = error;
    },

    limitWrites(bytes) {
      writeLimit = bytes;
    },
  };
}
