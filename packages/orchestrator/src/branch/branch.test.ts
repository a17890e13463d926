import assert from "node:assert/strict";
import test from "node:test";
import { Result } from "better-result";
import { createExecutionBranch, restoreExecutionBranch } from "./branch";
import type { BranchEvent } from "./events";

function defineTest(name: string, run: () => void | Promise<void>): void {
  void test(name, run);
}

function makeClock() {
  let now = 1000;
  let sequence = 0;
  return {
    options: {
      now: () => now,
      createId: () => {
        sequence += 1;
        return `evt-${sequence}`;
      },
    },
    tick(step: number) {
      now += step;
    },
  };
}

const ingestEvent: BranchEvent = {
  type: "ingest",
  id: "manual-1",
  source: "docs",
  itemIds: ["doc-1", "doc-2"],
  atEpochMs: 500,
};

defineTest("createExecutionBranch starts with no events", () => {
  const branch = createExecutionBranch("epic-E1/sub-task-A", {
    dataSource: { kind: "path", uri: "/work/repo" },
  });

  assert.equal(branch.id, "epic-E1/sub-task-A");
  assert.deepEqual(branch.events, []);
  assert.deepEqual(branch.resources, { dataSource: { kind: "path", uri: "/work/repo" } });
});

defineTest("withEvent appends without touching the original branch", () => {
  const original = createExecutionBranch("b1");
  const next = original.withEvent(ingestEvent);

  assert.equal(original.events.length, 0);
  assert.equal(next.events.length, 1);
  assert.deepEqual(next.events[0], ingestEvent);
  assert.equal(next.id, "b1");
});

defineTest("withEvent keeps prefix order for repeated appends", () => {
  const clock = makeClock();
  const b1 = createExecutionBranch("b1", {}, clock.options).withReasoningStep("draft", "plan it");
  clock.tick(10);
  const b2 = b1.withEvent(ingestEvent);

  assert.deepEqual(b2.events.slice(0, b1.events.length), b1.events);
  assert.equal(b2.events[1], b2.events.at(-1));
  assert.deepEqual(
    b2.events.map((event) => event.type),
    ["reasoning_step", "ingest"],
  );
});

defineTest("appended events are frozen copies", () => {
  const itemIds = ["doc-1"];
  const branch = createExecutionBranch("b1").withEvent({
    type: "ingest",
    id: "i1",
    source: "docs",
    itemIds,
    atEpochMs: 1,
  });

  itemIds.push("doc-2");
  const [stored] = branch.events;

  assert.deepEqual(stored?.type === "ingest" ? stored.itemIds : [], ["doc-1"]);
  assert.equal(Object.isFrozen(stored), true);
  assert.equal(Object.isFrozen(branch.events), true);
});

defineTest("forked continuations stay independent", () => {
  const clock = makeClock();
  const base = createExecutionBranch("b1", {}, clock.options).withReasoningStep("draft", "p0");
  const left = base.withReasoningStep("critique", "p1", { kind: "critique" });
  const right = base.fork("b1-alt").withIngest("web", ["page-1"]);

  assert.equal(base.events.length, 1);
  assert.equal(right.id, "b1-alt");
  assert.deepEqual(
    left.events.map((event) => event.type),
    ["reasoning_step", "reasoning_step"],
  );
  assert.deepEqual(
    right.events.map((event) => event.type),
    ["reasoning_step", "ingest"],
  );
  assert.equal(left.events[0], right.events[0]);
});

defineTest("sugar methods stamp ids and times from the injected clock", () => {
  const clock = makeClock();
  const branch = createExecutionBranch("b1", {}, clock.options)
    .withReasoningStep("state-a", "prompt-a", { toolCalls: ["search"] })
    .withStepExecution({ action: "run_tests", status: "error", error: "2 failing", durationMs: 12.7 });

  assert.deepEqual(branch.events, [
    {
      type: "reasoning_step",
      id: "evt-1",
      kind: "reasoning",
      state: "state-a",
      prompt: "prompt-a",
      toolCalls: ["search"],
      atEpochMs: 1000,
    },
    {
      type: "step_execution",
      id: "evt-2",
      action: "run_tests",
      status: "error",
      error: "2 failing",
      durationMs: 12,
      atEpochMs: 1000,
    },
  ]);
});

defineTest("replay folds every event kind in order", () => {
  const clock = makeClock();
  let branch = createExecutionBranch("b1", {}, clock.options).withIngest("docs", ["d1", "d2"]);
  clock.tick(5);
  branch = branch.withReasoningStep("first", "p1", { kind: "draft" });
  clock.tick(5);
  branch = branch.withIngest("docs", ["d2", "d3"]);
  clock.tick(5);
  branch = branch.withStepExecution({ action: "build", status: "success", durationMs: 3 });
  clock.tick(5);
  branch = branch.withStepExecution({ action: "lint", status: "error", error: "bad", durationMs: 1 });
  clock.tick(5);
  branch = branch.withReasoningStep("second", "p2", { kind: "final" });

  assert.deepEqual(branch.replay(), {
    branchId: "b1",
    eventCount: 6,
    reasoningStepCount: 2,
    latestReasoning: { kind: "final", state: "second", prompt: "p2" },
    ingestSources: ["docs"],
    ingestedItemIds: ["d1", "d2", "d3"],
    succeededSteps: 1,
    failedSteps: 1,
    lastStepError: "bad",
    lastEventAtEpochMs: 1025,
  });
});

defineTest("replay of an empty branch is the initial state", () => {
  assert.deepEqual(createExecutionBranch("empty").replay(), {
    branchId: "empty",
    eventCount: 0,
    reasoningStepCount: 0,
    ingestSources: [],
    ingestedItemIds: [],
    succeededSteps: 0,
    failedSteps: 0,
  });
});

defineTest("latestReasoningStep skips later non-reasoning events", () => {
  const clock = makeClock();
  const branch = createExecutionBranch("b1", {}, clock.options)
    .withReasoningStep("one", "p1")
    .withReasoningStep("two", "p2")
    .withIngest("docs", ["d1"]);

  assert.equal(branch.latestReasoningStep()?.state, "two");
  assert.equal(createExecutionBranch("b2").latestReasoningStep(), undefined);
});

defineTest("summarizeReasoning counts kinds, tool calls and duration", () => {
  const clock = makeClock();
  let branch = createExecutionBranch("b1", {}, clock.options).withReasoningStep("s1", "p1", {
    kind: "draft",
    toolCalls: ["search", "read_file"],
  });
  clock.tick(40);
  branch = branch.withIngest("docs", ["d1"]);
  clock.tick(60);
  branch = branch.withReasoningStep("s2", "p2", { kind: "draft", toolCalls: ["edit_file"] });
  clock.tick(25);
  branch = branch.withReasoningStep("s3", "p3", { kind: "final" });

  assert.deepEqual(branch.summarizeReasoning(), {
    totalSteps: 3,
    stepsByKind: { draft: 2, final: 1 },
    totalToolCalls: 3,
    firstStepAtEpochMs: 1000,
    lastStepAtEpochMs: 1125,
    durationMs: 125,
  });
});

defineTest("summarizeReasoning of a branch without reasoning is zeroed", () => {
  const summary = createExecutionBranch("b1").withEvent(ingestEvent).summarizeReasoning();

  assert.equal(summary.totalSteps, 0);
  assert.deepEqual(summary.stepsByKind, {});
  assert.equal(summary.firstStepAtEpochMs, undefined);
  assert.equal(summary.durationMs, 0);
});

defineTest("toSnapshot and restoreExecutionBranch preserve id, resources and events", () => {
  const clock = makeClock();
  const branch = createExecutionBranch(
    "b1",
    { retrievalStore: { kind: "vector", uri: "memory://store" } },
    clock.options,
  )
    .withReasoningStep("s1", "p1")
    .withEvent(ingestEvent);

  const snapshot = JSON.parse(JSON.stringify(branch.toSnapshot()));
  const restored = restoreExecutionBranch(snapshot, clock.options);
  if (Result.isError(restored)) {
    assert.fail(`Expected restore to succeed: ${restored.error.message}`);
  }

  assert.equal(restored.value.id, "b1");
  assert.deepEqual(restored.value.resources, {
    retrievalStore: { kind: "vector", uri: "memory://store" },
  });
  assert.deepEqual(restored.value.events, branch.events);

  const extended = restored.value.withIngest("web", ["p1"]);
  assert.equal(extended.events[2]?.id, "evt-2");
});

defineTest("restoreExecutionBranch rejects malformed events with their path", () => {
  const restored = restoreExecutionBranch({
    id: "b1",
    resources: {},
    events: [ingestEvent, { type: "ingest", id: "i2", source: "", itemIds: [], atEpochMs: 1 }],
  });

  if (Result.isOk(restored)) {
    assert.fail("Expected invalid snapshot");
  }
  assert.equal(restored.error.code, "invalid_branch_event");
  assert.equal(restored.error.message, "Branch snapshot failed validation: events.1.source");
});
