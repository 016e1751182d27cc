import { createServer, type Server, type Socket } from "node:net";
import { unlink } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import {
  defaultCodec,
  isMsgid,
  FrameLength,
  MessageType,
  type NotificationFrame,
  type ResponseFrame,
} from "@mpack-rpc/protocol";
import type { RecordedRequest } from "./mock-peer.ts";

/**
 * Method implementation on the peer. A thrown error becomes the response's
 * error value (its message); a returned value becomes the result.
 */
export type PeerHandler = (params: unknown[]) => unknown;

export interface SocketPeer {
  /** Unix socket path the peer listens on */
  socketPath: string;
  /** Close all connections and the server */
  close(): Promise<void>;
  /** Answer `method` with `handler` */
  setHandler(method: string, handler: PeerHandler): void;
  /** Send a notification to every connected client */
  notifyAll(method: string, params: unknown[]): void;
  /** Destroy every client connection, keeping the server up */
  dropConnections(): void;
  /** Number of open client connections */
  connectionCount(): number;
  /** Get all recorded requests */
  getRequests(): RecordedRequest[];
}

let nextSocketId = 1;

/**
 * Unique socket path in the temp directory.
 */
export function tempSocketPath(prefix = "mpack-rpc-test"): string {
  return path.join(tmpdir(), `${prefix}-${process.pid}-${nextSocketId++}.sock`);
}

/**
 * Start an in-process MessagePack-RPC peer on a Unix socket.
 *
 * @example
 * const peer = await startSocketPeer();
 * peer.setHandler("add", ([a, b]) => Number(a) + Number(b));
 *
 * const client = createClient();
 * await client.start(peer.socketPath);
 * const response = await client.request("add", [1, 2]); // result: 3
 *
 * await client.stop();
 * await peer.close();
 */
export async function startSocketPeer(
  socketPath = tempSocketPath()
): Promise<SocketPeer> {
  const handlers = new Map<string, PeerHandler>();
  const requests: RecordedRequest[] = [];
  const sockets = new Set<Socket>();

  const answer = (socket: Socket, frame: unknown): void => {
    if (!Array.isArray(frame) || frame.length !== FrameLength.REQUEST) return;
    const items: unknown[] = frame;
    const [type, msgid, method, params] = items;
    if (
      type !== MessageType.REQUEST ||
      !isMsgid(msgid) ||
      typeof method !== "string" ||
      !Array.isArray(params)
    ) {
      return;
    }
    requests.push({ msgid, method, params });

    const handler = handlers.get(method);
    let error: unknown = null;
    let result: unknown = null;
    if (!handler) {
      error = `Unknown method: ${method}`;
    } else {
      try {
        result = handler(params);
      } catch (err) {
        error = err instanceof Error ? err.message : String(err);
      }
    }
    const response: ResponseFrame = [MessageType.RESPONSE, msgid, error, result];
    socket.write(defaultCodec.encode(response));
  };

  const server: Server = createServer((socket) => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));
    socket.on("error", (err) => {
      console.error("Peer socket error:", err);
    });

    const serve = async () => {
      for await (const frame of defaultCodec.decodeStream(socket)) {
        answer(socket, frame);
      }
    };
    serve().catch((err: unknown) => {
      // Connections destroyed by the test end the stream with an error
      if (!socket.destroyed) {
        console.error("Peer could not decode request:", err);
        socket.destroy();
      }
    });
  });

  // Try to remove a stale socket file
  await unlink(socketPath).catch(() => undefined);

  await new Promise<void>((resolve, reject) => {
    server.on("error", reject);
    server.listen(socketPath, () => {
      server.removeListener("error", reject);
      resolve();
    });
  });

  return {
    socketPath,

    async close() {
      for (const socket of sockets) {
        socket.destroy();
      }
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },

    setHandler(method, handler) {
      handlers.set(method, handler);
    },

    notifyAll(method, params) {
      const frame: NotificationFrame = [MessageType.NOTIFICATION, method, params];
      const bytes = defaultCodec.encode(frame);
      for (const socket of sockets) {
        socket.write(bytes);
      }
    },

    dropConnections() {
      for (const socket of sockets) {
        socket.destroy();
      }
    },

    connectionCount: () => sockets.size,

    getRequests() {
      return [...requests];
    },
  };
}
