import assert from "node:assert/strict";
import test from "node:test";
import { AdmissionGate } from "./admission-gate";

function defineTest(name: string, run: () => void | Promise<void>): void {
  void test(name, run);
}

defineTest("capacity is clamped to at least one permit", () => {
  assert.equal(new AdmissionGate(0).capacity, 1);
  assert.equal(new AdmissionGate(2.9).capacity, 2);
});

defineTest("acquire admits up to capacity immediately", async () => {
  const gate = new AdmissionGate(2);

  const first = await gate.acquire();
  const second = await gate.acquire();

  assert.equal(typeof first, "function");
  assert.equal(typeof second, "function");
  assert.equal(gate.inFlight, 2);
  assert.equal(gate.waiting, 0);
});

defineTest("release hands the permit to the oldest waiter", async () => {
  const gate = new AdmissionGate(1);
  const order: string[] = [];

  const release = await gate.acquire();
  const waitingA = gate.acquire().then((permit) => {
    order.push("a");
    return permit;
  });
  const waitingB = gate.acquire().then((permit) => {
    order.push("b");
    return permit;
  });

  assert.equal(gate.waiting, 2);
  release?.();
  const permitA = await waitingA;
  assert.deepEqual(order, ["a"]);
  assert.equal(gate.inFlight, 1);

  permitA?.();
  const permitB = await waitingB;
  assert.deepEqual(order, ["a", "b"]);

  permitB?.();
  assert.equal(gate.inFlight, 0);
});

defineTest("releasing twice frees only one permit", async () => {
  const gate = new AdmissionGate(1);

  const release = await gate.acquire();
  release?.();
  release?.();

  assert.equal(gate.inFlight, 0);
  await gate.acquire();
  assert.equal(gate.inFlight, 1);
});

defineTest("aborting a queued acquire resolves undefined and leaves the queue", async () => {
  const gate = new AdmissionGate(1);
  const controller = new AbortController();

  const release = await gate.acquire();
  const queued = gate.acquire(controller.signal);
  assert.equal(gate.waiting, 1);

  controller.abort();
  assert.equal(await queued, undefined);
  assert.equal(gate.waiting, 0);

  release?.();
  assert.equal(gate.inFlight, 0);
});

defineTest("acquire with an already aborted signal does not take a permit", async () => {
  const gate = new AdmissionGate(1);

  assert.equal(await gate.acquire(AbortSignal.abort()), undefined);
  assert.equal(gate.inFlight, 0);
});
