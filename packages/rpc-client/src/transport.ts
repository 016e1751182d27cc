/**
 * Byte-stream connections for the client.
 */

import { connect as netConnect, type Socket } from "node:net";

const DEFAULT_TIMEOUT = 30000;

/** Buffered chunks above which the socket is paused until read. */
const HIGH_WATER_CHUNKS = 16;

/**
 * Ordered, reliable byte stream. The client only talks to the peer
 * through this interface.
 */
export interface ByteStreamConnector<H = unknown> {
  /** Open a connection to `address`. */
  connect(address: string): Promise<H>;
  /**
   * Read the next chunk of bytes.
   * @returns the chunk, or null once the stream has ended
   */
  read(handle: H): Promise<Uint8Array | null>;
  /**
   * Write bytes.
   * @returns the number of bytes written
   */
  write(handle: H, data: Uint8Array): Promise<number>;
  close(handle: H): Promise<void>;
}

export interface SocketConnectorOptions {
  /** Connection timeout in ms */
  timeout?: number;
}

export interface SocketHandle {
  socket: Socket;
  chunks: Uint8Array[];
  waiters: Array<{
    resolve: (chunk: Uint8Array | null) => void;
    reject: (error: Error) => void;
  }>;
  ended: boolean;
  closed: boolean;
  error: Error | null;
}

/**
 * Parse a socket address. `tcp://host:port` (or `tcp://[v6addr]:port`)
 * selects TCP; anything else is a Unix socket path.
 */
export function parseAddress(
  address: string
): { path: string } | { host: string; port: number } {
  const match = /^tcp:\/\/(.+):(\d+)$/.exec(address);
  if (match) {
    // IPv6 literals are written in brackets: tcp://[::1]:6666
    const host = match[1].replace(/^\[(.*)\]$/, "$1");
    return { host, port: Number(match[2]) };
  }
  return { path: address };
}

/**
 * Create a socket connection.
 */
function createSocket(address: string, timeout: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const target = parseAddress(address);

    const onError = (err: Error) => {
      clearTimeout(timeoutId);
      reject(err);
    };

    const onConnect = () => {
      clearTimeout(timeoutId);
      socket.removeListener("error", onError);
      resolve(socket);
    };

    const socket =
      "path" in target
        ? netConnect(target.path, onConnect)
        : netConnect(target.port, target.host, onConnect);

    socket.on("error", onError);

    // Connection timeout
    const timeoutId = setTimeout(() => {
      socket.removeListener("error", onError);
      socket.destroy();
      reject(new Error(`Connection timeout after ${timeout}ms`));
    }, timeout);
  });
}

function attach(socket: Socket): SocketHandle {
  const handle: SocketHandle = {
    socket,
    chunks: [],
    waiters: [],
    ended: false,
    closed: false,
    error: null,
  };

  socket.on("data", (chunk: Buffer) => {
    const waiter = handle.waiters.shift();
    if (waiter) {
      waiter.resolve(chunk);
      return;
    }
    handle.chunks.push(chunk);
    if (handle.chunks.length >= HIGH_WATER_CHUNKS) {
      socket.pause();
    }
  });

  socket.on("error", (err) => {
    handle.error = err;
    for (const waiter of handle.waiters.splice(0)) {
      waiter.reject(err);
    }
  });

  const onEnd = () => {
    handle.ended = true;
    for (const waiter of handle.waiters.splice(0)) {
      waiter.resolve(null);
    }
  };

  socket.on("end", onEnd);
  socket.on("close", () => {
    handle.closed = true;
    if (handle.error === null) {
      onEnd();
    }
  });

  return handle;
}

/**
 * Connector over `node:net` sockets.
 */
export function createSocketConnector(
  options: SocketConnectorOptions = {}
): ByteStreamConnector<SocketHandle> {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;

  return {
    async connect(address) {
      const socket = await createSocket(address, timeout);
      return attach(socket);
    },

    read(handle) {
      if (handle.chunks.length > 0) {
        const [chunk] = handle.chunks.splice(0, 1);
        if (handle.chunks.length < HIGH_WATER_CHUNKS && handle.socket.isPaused()) {
          handle.socket.resume();
        }
        return Promise.resolve(chunk);
      }
      if (handle.error) {
        return Promise.reject(handle.error);
      }
      if (handle.ended) {
        return Promise.resolve(null);
      }
      return new Promise((resolve, reject) => {
        handle.waiters.push({ resolve, reject });
      });
    },

    write(handle, data) {
      return new Promise((resolve, reject) => {
        if (handle.closed || !handle.socket.writable) {
          reject(new Error("Socket is not writable"));
          return;
        }
        handle.socket.write(data, (err) => {
          if (err) {
            reject(err);
          } else {
            resolve(data.length);
          }
        });
      });
    },

    close(handle) {
      if (handle.closed) {
        return Promise.resolve();
      }
      return new Promise((resolve) => {
        handle.socket.once("close", () => resolve());
        handle.socket.destroy();
      });
    },
  };
}
