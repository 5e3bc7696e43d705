import test from "node:test";
import assert from "node:assert/strict";

import { KeyedMutex } from "./services/keyed-mutex";

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

test("tasks sharing a key run one at a time in arrival order", async () => {
  const mutex = new KeyedMutex();
  const order: string[] = [];

  await Promise.all([
    mutex.run("session:1", async () => {
      order.push("a-start");
      await delay(20);
      order.push("a-end");
    }),
    mutex.run("session:1", async () => {
      order.push("b-start");
      order.push("b-end");
    }),
  ]);

  assert.deepEqual(order, ["a-start", "a-end", "b-start", "b-end"]);
});

test("tasks on different keys do not wait for each other", async () => {
  const mutex = new KeyedMutex();
  let open: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    open = resolve;
  });

  const results = await Promise.all([
    mutex.run("customer:1", async () => {
      await gate;
      return 1;
    }),
    mutex.run("customer:2", async () => {
      open();
      return 2;
    }),
  ]);

  assert.deepEqual(results, [1, 2]);
});

test("a failing task releases its key", async () => {
  const mutex = new KeyedMutex();

  await assert.rejects(
    mutex.run("outreach:1", async () => {
      throw new Error("boom");
    }),
    /boom/,
  );
  assert.equal(await mutex.run("outreach:1", async () => "next"), "next");
  assert.equal(mutex.pendingKeys, 0);
});
