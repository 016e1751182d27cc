/**
 * Correlation of in-flight calls with their responses.
 */

import { MAX_MSGID, nilResponse, type Response } from "@mpack-rpc/protocol";

interface PendingCall {
  msgid: number;
  resolve: (response: Response) => void;
}

export interface CorrelationTable {
  /** Allocate the next msgid, skipping ids that are still pending. */
  allocate(): number;
  /**
   * Register a pending call. The returned promise resolves exactly once,
   * with the matching response or with the neutral response on drain.
   */
  register(msgid: number): Promise<Response>;
  /** Resolve and remove the pending call for `response.msgid`, if any. */
  settle(response: Response): boolean;
  /** Remove a pending call without resolving it. */
  discard(msgid: number): boolean;
  /** Resolve every pending call neutrally and empty the table. */
  drain(): number;
  has(msgid: number): boolean;
  size(): number;
}

/**
 * Find the first msgid at or after `candidate` (wrapping at 2^32) for which
 * `inUse` is false.
 */
export function allocateMsgid(
  candidate: number,
  inUse: (msgid: number) => boolean
): number {
  let msgid = candidate >>> 0;
  for (let tries = 0; tries <= MAX_MSGID && inUse(msgid); tries++) {
    msgid = (msgid + 1) >>> 0;
  }
  return msgid;
}

export function createCorrelationTable(initialMsgid = 0): CorrelationTable {
  const pending = new Map<number, PendingCall>();
  let nextMsgid = initialMsgid >>> 0;

  return {
    allocate() {
      const msgid = allocateMsgid(nextMsgid, (id) => pending.has(id));
      nextMsgid = (msgid + 1) >>> 0;
      return msgid;
    },

    register(msgid) {
      if (pending.has(msgid)) {
        throw new Error(`msgid ${msgid} is already pending`);
      }
      return new Promise((resolve) => {
        pending.set(msgid, { msgid, resolve });
      });
    },

    settle(response) {
      const call = pending.get(response.msgid);
      if (!call) {
        return false;
      }
      pending.delete(response.msgid);
      call.resolve(response);
      return true;
    },

    discard(msgid) {
      return pending.delete(msgid);
    },

    drain() {
      const calls = [...pending.values()];
      pending.clear();
      for (const call of calls) {
        call.resolve(nilResponse(call.msgid));
      }
      return calls.length;
    },

    has: (msgid) => pending.has(msgid),
    size: () => pending.size,
  };
}
