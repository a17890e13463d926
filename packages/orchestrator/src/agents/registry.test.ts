import assert from "node:assert/strict";
import test from "node:test";
import { Result } from "better-result";
import { createPermissionGuard } from "../policy";
import { DEFAULT_AGENT_ID, createAgentRegistry } from "./registry";

function defineTest(name: string, run: () => void | Promise<void>): void {
  void test(name, run);
}

function makeRegistryWithClock(heartbeatTimeoutMs = 5000) {
  let now = 1000;
  const registry = createAgentRegistry({
    now: () => now,
    heartbeatTimeoutMs,
    guard: createPermissionGuard({ workingDirectory: "/work/repo" }),
  });

  const tick = (step: number) => {
    now += step;
    return now;
  };

  return { registry, tick };
}

defineTest("register creates an agent stamped with the current time", () => {
  const { registry } = makeRegistryWithClock();

  const registered = registry.register("a1", ["review", "review", "search"], "sandboxed");
  if (Result.isError(registered)) {
    assert.fail("Expected register to succeed");
  }

  assert.equal(registered.value.id, "a1");
  assert.deepEqual([...registered.value.capabilities], ["review", "search"]);
  assert.equal(registered.value.permissionLevel, "sandboxed");
  assert.equal(registered.value.registeredAtEpochMs, 1000);
  assert.equal(registered.value.lastHeartbeatEpochMs, 1000);
});

defineTest("register rejects duplicate agent ids", () => {
  const { registry } = makeRegistryWithClock();

  const first = registry.register("a1", [], "isolated");
  const second = registry.register("a1", ["other"], "trusted");

  assert.equal(Result.isOk(first), true);
  if (Result.isOk(second)) {
    assert.fail("Expected duplicate agent rejection");
  }
  assert.equal(second.error.code, "duplicate_agent");
  assert.equal(registry.getAgent("a1")?.permissionLevel, "isolated");
});

defineTest("register rejects blank agent ids", () => {
  const { registry } = makeRegistryWithClock();

  const blank = registry.register("  ", [], "isolated");
  if (Result.isOk(blank)) {
    assert.fail("Expected blank id rejection");
  }
  assert.equal(blank.error.code, "invalid_identifier");
});

defineTest("heartbeat on an unknown agent returns unknown_agent", () => {
  const { registry } = makeRegistryWithClock();

  const beat = registry.heartbeat("unknown-agent");
  if (Result.isOk(beat)) {
    assert.fail("Expected unknown agent error");
  }
  assert.equal(beat.error.code, "unknown_agent");
  assert.equal(beat.error.message, "Unknown agent id 'unknown-agent'");
});

defineTest("agent is healthy for one timeout window after register", () => {
  const { registry, tick } = makeRegistryWithClock();
  registry.register("a1", [], "isolated");

  assert.equal(registry.isHealthy("a1", 5000), true);
  tick(5000);
  assert.equal(registry.isHealthy("a1", 5000), true);
  tick(1);
  assert.equal(registry.isHealthy("a1", 5000), false);
});

defineTest("heartbeat restores health and only touches lastHeartbeat", () => {
  const { registry, tick } = makeRegistryWithClock();
  registry.register("a1", ["review"], "trusted");

  tick(6000);
  assert.equal(registry.isHealthy("a1"), false);

  const beat = registry.heartbeat("a1");
  assert.equal(Result.isOk(beat), true);
  assert.equal(registry.isHealthy("a1"), true);

  const agent = registry.getAgent("a1");
  assert.equal(agent?.lastHeartbeatEpochMs, 7000);
  assert.equal(agent?.registeredAtEpochMs, 1000);
  assert.equal(agent?.permissionLevel, "trusted");
});

defineTest("unknown agents are never healthy", () => {
  const { registry } = makeRegistryWithClock();
  assert.equal(registry.isHealthy("ghost"), false);
});

defineTest("getOrCreate is idempotent and keeps the first registration", () => {
  const { registry, tick } = makeRegistryWithClock();

  const created = registry.getOrCreate("pool-1", ["epic-E1"], "sandboxed");
  tick(10);
  const again = registry.getOrCreate("pool-1", ["other"], "trusted");

  assert.equal(again, created);
  assert.equal(again.permissionLevel, "sandboxed");
  assert.deepEqual([...again.capabilities], ["epic-E1"]);
  assert.equal(registry.listAgents().length, 1);
});

defineTest("getOrCreate falls back to registry defaults", () => {
  let now = 0;
  const registry = createAgentRegistry({
    now: () => now,
    defaultCapabilities: ["general"],
    defaultPermissionLevel: "sandboxed",
  });
  now = 50;

  const agent = registry.getOrCreate("pool-2");

  assert.deepEqual([...agent.capabilities], ["general"]);
  assert.equal(agent.permissionLevel, "sandboxed");
  assert.equal(agent.registeredAtEpochMs, 50);
});

defineTest("getOrCreate resolves a blank id to the default agent", () => {
  const { registry } = makeRegistryWithClock();

  const blank = registry.getOrCreate("", ["epic-E1"], "isolated");
  const whitespace = registry.getOrCreate("   ");

  assert.equal(blank.id, DEFAULT_AGENT_ID);
  assert.equal(whitespace, blank);
  assert.equal(registry.getAgent(""), undefined);
  assert.deepEqual(
    registry.listAgents().map((agent) => agent.id),
    ["default-agent"],
  );
});

defineTest("listStaleAgents reports agents past the timeout without removing them", () => {
  const { registry, tick } = makeRegistryWithClock();
  registry.register("a1", [], "isolated");
  tick(3000);
  registry.register("a2", [], "isolated");
  tick(3000);

  const stale = registry.listStaleAgents();

  assert.deepEqual(
    stale.map((agent) => agent.id),
    ["a1"],
  );
  assert.equal(registry.listAgents().length, 2);
});

defineTest("unregister removes the agent once", () => {
  const { registry } = makeRegistryWithClock();
  registry.register("a1", [], "isolated");

  assert.equal(registry.unregister("a1"), true);
  assert.equal(registry.unregister("a1"), false);
  assert.equal(registry.getAgent("a1"), undefined);
});

defineTest("authorize checks requests against the agent permission level", () => {
  const { registry } = makeRegistryWithClock();
  registry.register("reader", [], "isolated");
  registry.register("writer", [], "sandboxed");

  assert.equal(Result.isOk(registry.authorize("reader", [{ action: "read_file" }])), true);

  const denied = registry.authorize("reader", [{ action: "write_file", resource: "src/a.ts" }]);
  if (Result.isOk(denied)) {
    assert.fail("Expected isolated agent write to be denied");
  }
  assert.equal(denied.error.code, "permission_denied");

  assert.equal(
    Result.isOk(registry.authorize("writer", [{ action: "write_file", resource: "src/a.ts" }])),
    true,
  );

  const missing = registry.authorize("ghost", []);
  if (Result.isOk(missing)) {
    assert.fail("Expected unknown agent error");
  }
  assert.equal(missing.error.code, "unknown_agent");
});
