import { test, describe, afterEach } from "node:test";
import assert from "node:assert";
import { createEventSource, createSocketConnector, type RpcEvent } from "@mpack-rpc/client";
import { defaultCodec, MessageType } from "@mpack-rpc/protocol";
import {
  createMockPeer,
  startSocketPeer,
  recordEvents,
  type SocketPeer,
} from "./index.ts";

// ============================================================================
// createMockPeer tests
// ============================================================================

describe("createMockPeer", () => {
  test("records request frames written by the client", async () => {
    const peer = createMockPeer();
    const handle = await peer.connector.connect("/tmp/mock.sock");

    const written = await peer.connector.write(
      handle,
      defaultCodec.encode([MessageType.REQUEST, 4, "echo", ["hi"]])
    );

    assert.strictEqual(written, 12);
    assert.deepStrictEqual(peer.getRequests(), [
      { msgid: 4, method: "echo", params: ["hi"] },
    ]);
    assert.deepStrictEqual(peer.getConnections(), ["/tmp/mock.sock"]);
  });

  test("waits for requests", async () => {
    const peer = createMockPeer();
    const handle = await peer.connector.connect("/tmp/mock.sock");

    const waiting = peer.waitForRequests(2);
    await peer.connector.write(handle, defaultCodec.encode([0, 1, "a", []]));
    await peer.connector.write(handle, defaultCodec.encode([0, 2, "b", []]));

    const requests = await waiting;
    assert.deepStrictEqual(
      requests.map((r) => r.method),
      ["a", "b"]
    );
  });

  test("delivers sent frames to reads in order", async () => {
    const peer = createMockPeer();
    const handle = await peer.connector.connect("/tmp/mock.sock");

    const first = peer.connector.read(handle);
    peer.respond(1, null, "one");
    peer.notify("tick", [2]);

    const firstChunk = await first;
    const secondChunk = await peer.connector.read(handle);
    assert.ok(firstChunk && secondChunk);
    assert.deepStrictEqual(defaultCodec.decodeAll(firstChunk), [[1, 1, null, "one"]]);
    assert.deepStrictEqual(defaultCodec.decodeAll(secondChunk), [[2, "tick", [2]]]);
  });

  test("rejects writes that are not request frames", async () => {
    const peer = createMockPeer();
    const handle = await peer.connector.connect("/tmp/mock.sock");

    await assert.rejects(
      peer.connector.write(handle, defaultCodec.encode([0, 1, "short"])),
      /Peer received a value that is not a request/
    );
    assert.deepStrictEqual(peer.getRequests(), []);
  });

  test("fails pending reads", async () => {
    const peer = createMockPeer();
    const handle = await peer.connector.connect("/tmp/mock.sock");

    const reading = peer.connector.read(handle);
    peer.failRead(new Error("boom"));

    await assert.rejects(reading, /boom/);
    await assert.rejects(peer.connector.read(handle), /boom/);
  });

  test("ends the stream", async () => {
    const peer = createMockPeer();
    const handle = await peer.connector.connect("/tmp/mock.sock");

    const reading = peer.connector.read(handle);
    peer.end();

    assert.strictEqual(await reading, null);
    assert.strictEqual(peer.isConnected(), false);
  });

  test("fails the next connect only", async () => {
    const peer = createMockPeer();
    peer.failNextConnect(new Error("ENOENT"));

    await assert.rejects(peer.connector.connect("/tmp/missing.sock"), /ENOENT/);
    await peer.connector.connect("/tmp/mock.sock");
    assert.strictEqual(peer.isConnected(), true);
  });

  test("limits and fails writes", async () => {
    const peer = createMockPeer();
    const handle = await peer.connector.connect("/tmp/mock.sock");
    const frame = defaultCodec.encode([0, 1, "a", []]);

    peer.limitWrites(2);
    assert.strictEqual(await peer.connector.write(handle, frame), 2);
    assert.deepStrictEqual(peer.getRequests(), []);

    peer.limitWrites(null);
    peer.failWrites(new Error("EPIPE"));
    await assert.rejects(peer.connector.write(handle, frame), /EPIPE/);
  });
});

// ============================================================================
// recordEvents tests
// ============================================================================

describe("recordEvents", () => {
  test("records events and completion", async () => {
    const source = createEventSource<RpcEvent>();
    const recorder = recordEvents(source.stream);

    const waiting = recorder.waitFor((e) => e.type === "notification");
    source.emit({ type: "notification", method: "a", params: [] });
    source.complete();

    assert.deepStrictEqual(await waiting, { type: "notification", method: "a", params: [] });
    assert.strictEqual(recorder.events.length, 1);
    assert.strictEqual(recorder.completed(), true);
  });
});

// ============================================================================
// startSocketPeer tests
// ============================================================================

describe("startSocketPeer", () => {
  let peer: SocketPeer | undefined;

  afterEach(async () => {
    await peer?.close();
    peer = undefined;
  });

  test("answers requests over a Unix socket", async () => {
    peer = await startSocketPeer();
    peer.setHandler("add", ([a, b]) => Number(a) + Number(b));

    const connector = createSocketConnector({ timeout: 1000 });
    const handle = await connector.connect(peer.socketPath);
    try {
      await connector.write(handle, defaultCodec.encode([0, 7, "add", [2, 3]]));
      const chunk = await connector.read(handle);

      assert.ok(chunk);
      assert.deepStrictEqual(defaultCodec.decodeAll(chunk), [[1, 7, null, 5]]);
      assert.deepStrictEqual(peer.getRequests(), [
        { msgid: 7, method: "add", params: [2, 3] },
      ]);
    } finally {
      await connector.close(handle);
    }
  });

  test("reports unknown methods as errors", async () => {
    peer = await startSocketPeer();

    const connector = createSocketConnector({ timeout: 1000 });
    const handle = await connector.connect(peer.socketPath);
    try {
      await connector.write(handle, defaultCodec.encode([0, 1, "nope", []]));
      const chunk = await connector.read(handle);

      assert.ok(chunk);
      assert.deepStrictEqual(defaultCodec.decodeAll(chunk), [
        [1, 1, "Unknown method: nope", null],
      ]);
    } finally {
      await connector.close(handle);
    }
  });
});
