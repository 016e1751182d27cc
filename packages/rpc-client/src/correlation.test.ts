import { describe, it } from "node:test";
import assert from "node:assert";
import { allocateMsgid, createCorrelationTable } from "./correlation.ts";

describe("allocateMsgid", () => {
  it("should return the candidate when it is free", () => {
    assert.strictEqual(allocateMsgid(7, () => false), 7);
  });

  it("should skip ids in use and wrap at 2^32", () => {
    const inUse = new Set([0xffffffff, 0]);
    assert.strictEqual(allocateMsgid(0xffffffff, (id) => inUse.has(id)), 1);
  });
});

describe("createCorrelationTable", () => {
  it("should allocate increasing msgids from the initial value", () => {
    const table = createCorrelationTable();
    assert.deepStrictEqual(
      [table.allocate(), table.allocate(), table.allocate()],
      [0, 1, 2]
    );
  });

  it("should wrap after 0xffffffff", () => {
    const table = createCorrelationTable(0xfffffffe);
    assert.deepStrictEqual(
      [table.allocate(), table.allocate(), table.allocate(), table.allocate()],
      [0xfffffffe, 0xffffffff, 0, 1]
    );
  });

  it("should not hand out an id that is still pending", () => {
    const table = createCorrelationTable();
    void table.register(1);

    assert.strictEqual(table.allocate(), 0);
    assert.strictEqual(table.allocate(), 2);
  });

  it("should resolve a pending call exactly once", async () => {
    const table = createCorrelationTable();
    const pending = table.register(3);

    assert.strictEqual(table.settle({ msgid: 3, error: null, result: "ok" }), true);
    assert.strictEqual(table.settle({ msgid: 3, error: null, result: "again" }), false);
    assert.deepStrictEqual(await pending, { msgid: 3, error: null, result: "ok" });
    assert.strictEqual(table.size(), 0);
  });

  it("should ignore responses for unknown msgids", () => {
    const table = createCorrelationTable();
    assert.strictEqual(table.settle({ msgid: 99, error: null, result: null }), false);
  });

  it("should drain pending calls with the neutral response", async () => {
    const table = createCorrelationTable();
    const calls = [table.register(0), table.register(1), table.register(2)];

    assert.strictEqual(table.drain(), 3);
    assert.strictEqual(table.size(), 0);
    assert.deepStrictEqual(await Promise.all(calls), [
      { msgid: 0, error: null, result: null },
      { msgid: 1, error: null, result: null },
      { msgid: 2, error: null, result: null },
    ]);
  });

  it("should discard a pending call", () => {
    const table = createCorrelationTable();
    void table.register(4);

    assert.strictEqual(table.has(4), true);
    assert.strictEqual(table.discard(4), true);
    assert.strictEqual(table.has(4), false);
    assert.strictEqual(table.discard(4), false);
  });

  it("should refuse to register a msgid twice", () => {
    const table = createCorrelationTable();
    void table.register(5);

    assert.throws(() => table.register(5), /msgid 5 is already pending/);
  });
});
