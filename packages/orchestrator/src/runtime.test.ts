import assert from "node:assert/strict";
import test from "node:test";
import { DEFAULT_ORCHESTRATOR_CONFIG, type OrchestratorRuntimeConfig } from "@taskforge/config";
import { Result } from "better-result";
import { createOrchestratorRuntime } from "./runtime";

function defineTest(name: string, run: () => void | Promise<void>): void {
  void test(name, run);
}

function makeConfig(): OrchestratorRuntimeConfig {
  return {
    logLevel: "silent",
    coordinator: {
      ...DEFAULT_ORCHESTRATOR_CONFIG.coordinator,
      branchPrefix: "feature",
      maxConcurrentSubTasks: 2,
      workingDirectory: "/work/repo",
    },
    agents: {
      heartbeatTimeoutMs: 10,
      defaultCapabilities: ["general"],
    },
  };
}

defineTest("createOrchestratorRuntime shares one registry and guard", () => {
  const runtime = createOrchestratorRuntime(makeConfig(), { now: () => 0 });

  assert.equal(runtime.coordinator.registry, runtime.registry);
  assert.equal(runtime.guard.workingDirectory, "/work/repo");
  assert.equal(runtime.coordinator.config.maxConcurrentSubTasks, 2);
  assert.equal(runtime.logger.level, "silent");
});

defineTest("runtime coordinator uses the configured branch prefix and resources", () => {
  const runtime = createOrchestratorRuntime(makeConfig(), { now: () => 0 });
  runtime.coordinator.registerEpic("E7", "Title", "", ["A"]);

  const assignment = runtime.coordinator.getAssignment("E7", "A");
  assert.equal(assignment?.branchName, "feature-E7/sub-task-A");
  assert.deepEqual(assignment?.branch?.resources, {
    dataSource: { kind: "path", uri: "/work/repo" },
  });
});

defineTest("runtime registry applies the configured heartbeat timeout and capabilities", () => {
  let now = 0;
  const runtime = createOrchestratorRuntime(makeConfig(), { now: () => now });

  const agent = runtime.registry.getOrCreate("helper");
  assert.deepEqual([...agent.capabilities], ["general"]);
  assert.equal(agent.permissionLevel, "sandboxed");

  now = 10;
  assert.equal(runtime.registry.isHealthy("helper"), true);
  now = 11;
  assert.equal(runtime.registry.isHealthy("helper"), false);
  assert.deepEqual(
    runtime.registry.listStaleAgents().map((stale) => stale.id),
    ["helper"],
  );
});

defineTest("runtime executes sub-tasks end to end", async () => {
  const runtime = createOrchestratorRuntime(makeConfig(), { now: () => 5 });
  runtime.coordinator.registerEpic("E1", "Title", "", ["A", "B", "C"]);

  const results = await runtime.coordinator.executeManyConcurrently(
    "E1",
    ["A", "B", "C"],
    (assignment) =>
      Result.ok({
        ...assignment,
        branch: assignment.branch?.withIngest("tracker", [`issue-${assignment.subTaskId}`]),
      }),
  );

  assert.equal(results.filter((result) => Result.isOk(result)).length, 3);
  assert.deepEqual(
    runtime.coordinator.getAssignments("E1").map((assignment) => assignment.branch?.events.length),
    [1, 1, 1],
  );
});
