import type { EventStream, Logger, RpcEvent } from "@mpack-rpc/client";

export {
  createMockPeer,
  type MockPeer,
  type MockPeerOptions,
  type MockHandle,
  type RecordedRequest,
} from "./mock-peer.ts";
export {
  startSocketPeer,
  tempSocketPath,
  type SocketPeer,
  type PeerHandler,
} from "./socket-peer.ts";

// ============================================================================
// Helpers
// ============================================================================

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Let every queued promise continuation run.
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export interface EventRecorder {
  /** Events received so far */
  events: RpcEvent[];
  /** Whether the stream completed */
  completed(): boolean;
  /** Resolve with the first recorded event matching `predicate`. */
  waitFor(predicate: (event: RpcEvent) => boolean): Promise<RpcEvent>;
  unsubscribe(): void;
}

/**
 * Record every event a client broadcasts.
 *
 * @example
 * const recorder = recordEvents(client.events);
 * peer.notify("redraw", [1]);
 * await recorder.waitFor((e) => e.type === "notification");
 */
export function recordEvents(stream: EventStream<RpcEvent>): EventRecorder {
  const events: RpcEvent[] = [];
  const waiters: Array<{
    predicate: (event: RpcEvent) => boolean;
    resolve: (event: RpcEvent) => void;
  }> = [];
  let completed = false;

  const unsubscribe = stream.subscribe({
    next(event) {
      events.push(event);
      for (const waiter of [...waiters]) {
        if (waiter.predicate(event)) {
          waiters.splice(waiters.indexOf(waiter), 1);
          waiter.resolve(event);
        }
      }
    },
    complete() {
      completed = true;
    },
  });

  return {
    events,
    completed: () => completed,
    waitFor(predicate) {
      const seen = events.find(predicate);
      if (seen) {
        return Promise.resolve(seen);
      }
      return new Promise((resolve) => {
        waiters.push({ predicate, resolve });
      });
    },
    unsubscribe,
  };
}
