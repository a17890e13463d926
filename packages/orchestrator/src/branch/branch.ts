import { randomUUID } from "node:crypto";
import type { OrchestratorResult, OrchestratorValidationError } from "@taskforge/core/errors";
import { Result } from "better-result";
import {
  parseExecutionBranchSnapshot,
  type BranchEvent,
  type BranchResources,
  type ExecutionBranchSnapshot,
  type ReasoningStepEvent,
  type StepExecutionEvent,
} from "./events";

export interface ExecutionBranchOptions {
  readonly now?: () => number;
  readonly createId?: () => string;
}

export interface ReasoningStepOptions {
  readonly kind?: string;
  readonly toolCalls?: readonly string[];
}

export interface StepExecutionInput {
  readonly action: string;
  readonly status: StepExecutionEvent["status"];
  readonly output?: string;
  readonly error?: string;
  readonly durationMs: number;
}

/** Materialized view produced by folding a branch's events in order. */
export interface BranchState {
  readonly branchId: string;
  readonly eventCount: number;
  readonly reasoningStepCount: number;
  readonly latestReasoning?: {
    readonly kind: string;
    readonly state: string;
    readonly prompt: string;
  };
  readonly ingestSources: readonly string[];
  readonly ingestedItemIds: readonly string[];
  readonly succeededSteps: number;
  readonly failedSteps: number;
  readonly lastStepError?: string;
  readonly lastEventAtEpochMs?: number;
}

export interface ReasoningSummary {
  readonly totalSteps: number;
  readonly stepsByKind: Readonly<Record<string, number>>;
  readonly totalToolCalls: number;
  readonly firstStepAtEpochMs?: number;
  readonly lastStepAtEpochMs?: number;
  readonly durationMs: number;
}

/**
 * Append-only execution record for one sub-task.
 *
 * Every `with*` call returns a new branch whose events are the old events
 * plus one; the receiver is never modified, so two continuations built from
 * the same branch stay independent.
 */
export interface ExecutionBranch {
  readonly id: string;
  readonly resources: BranchResources;
  readonly events: readonly BranchEvent[];
  withEvent(event: BranchEvent): ExecutionBranch;
  withReasoningStep(state: string, prompt: string, options?: ReasoningStepOptions): ExecutionBranch;
  withIngest(source: string, itemIds: readonly string[]): ExecutionBranch;
  withStepExecution(input: StepExecutionInput): ExecutionBranch;
  fork(id: string): ExecutionBranch;
  replay(): BranchState;
  latestReasoningStep(): ReasoningStepEvent | undefined;
  summarizeReasoning(): ReasoningSummary;
  toSnapshot(): ExecutionBranchSnapshot;
}

const DEFAULT_REASONING_KIND = "reasoning";

interface BranchClock {
  readonly now: () => number;
  readonly createId: () => string;
}

function resolveClock(options: ExecutionBranchOptions): BranchClock {
  return {
    now: options.now ?? (() => Date.now()),
    createId: options.createId ?? (() => randomUUID()),
  };
}

function freezeEvent(event: BranchEvent): BranchEvent {
  if (event.type === "reasoning_step") {
    const toolCalls = [...event.toolCalls];
    Object.freeze(toolCalls);
    return Object.freeze({ ...event, toolCalls });
  }

  if (event.type === "ingest") {
    const itemIds = [...event.itemIds];
    Object.freeze(itemIds);
    return Object.freeze({ ...event, itemIds });
  }

  return Object.freeze({ ...event });
}

function copyResources(resources: BranchResources): BranchResources {
  return {
    ...(resources.retrievalStore ? { retrievalStore: { ...resources.retrievalStore } } : {}),
    ...(resources.dataSource ? { dataSource: { ...resources.dataSource } } : {}),
  };
}

function freezeResources(resources: BranchResources): BranchResources {
  const copy = copyResources(resources);
  if (copy.retrievalStore) Object.freeze(copy.retrievalStore);
  if (copy.dataSource) Object.freeze(copy.dataSource);
  return Object.freeze(copy);
}

function appendUnique(values: readonly string[], additions: readonly string[]): readonly string[] {
  const next = [...values];
  for (const value of additions) {
    if (!next.includes(value)) next.push(value);
  }
  return next;
}

function applyEvent(state: BranchState, event: BranchEvent): BranchState {
  const base = { ...state, eventCount: state.eventCount + 1, lastEventAtEpochMs: event.atEpochMs };

  switch (event.type) {
    case "reasoning_step":
      return {
        ...base,
        reasoningStepCount: state.reasoningStepCount + 1,
        latestReasoning: { kind: event.kind, state: event.state, prompt: event.prompt },
      };
    case "ingest":
      return {
        ...base,
        ingestSources: appendUnique(state.ingestSources, [event.source]),
        ingestedItemIds: appendUnique(state.ingestedItemIds, event.itemIds),
      };
    case "step_execution":
      if (event.status === "success") {
        return { ...base, succeededSteps: state.succeededSteps + 1 };
      }
      return {
        ...base,
        failedSteps: state.failedSteps + 1,
        lastStepError: event.error,
      };
    default: {
      const unreachableEvent: never = event;
      void unreachableEvent;
      return base;
    }
  }
}

class ImmutableExecutionBranch implements ExecutionBranch {
  readonly events: readonly BranchEvent[];

  constructor(
    readonly id: string,
    readonly resources: BranchResources,
    events: readonly BranchEvent[],
    private readonly clock: BranchClock,
  ) {
    this.events = Object.freeze([...events]);
    Object.freeze(this);
  }

  withEvent(event: BranchEvent): ExecutionBranch {
    return new ImmutableExecutionBranch(
      this.id,
      this.resources,
      [...this.events, freezeEvent(event)],
      this.clock,
    );
  }

  withReasoningStep(
    state: string,
    prompt: string,
    options: ReasoningStepOptions = {},
  ): ExecutionBranch {
    return this.withEvent({
      type: "reasoning_step",
      id: this.clock.createId(),
      kind: options.kind ?? DEFAULT_REASONING_KIND,
      state,
      prompt,
      toolCalls: [...(options.toolCalls ?? [])],
      atEpochMs: this.clock.now(),
    });
  }

  withIngest(source: string, itemIds: readonly string[]): ExecutionBranch {
    return this.withEvent({
      type: "ingest",
      id: this.clock.createId(),
      source,
      itemIds: [...itemIds],
      atEpochMs: this.clock.now(),
    });
  }

  withStepExecution(input: StepExecutionInput): ExecutionBranch {
    return this.withEvent({
      type: "step_execution",
      id: this.clock.createId(),
      action: input.action,
      status: input.status,
      ...(input.output !== undefined ? { output: input.output } : {}),
      ...(input.error !== undefined ? { error: input.error } : {}),
      durationMs: Math.max(0, Math.trunc(input.durationMs)),
      atEpochMs: this.clock.now(),
    });
  }

  fork(id: string): ExecutionBranch {
    return new ImmutableExecutionBranch(id, this.resources, this.events, this.clock);
  }

  replay(): BranchState {
    const initial: BranchState = {
      branchId: this.id,
      eventCount: 0,
      reasoningStepCount: 0,
      ingestSources: [],
      ingestedItemIds: [],
      succeededSteps: 0,
      failedSteps: 0,
    };

    return this.events.reduce(applyEvent, initial);
  }

  latestReasoningStep(): ReasoningStepEvent | undefined {
    for (let index = this.events.length - 1; index >= 0; index -= 1) {
      const event = this.events[index];
      if (event?.type === "reasoning_step") return event;
    }
    return undefined;
  }

  summarizeReasoning(): ReasoningSummary {
    const steps = this.events.filter(
      (event): event is ReasoningStepEvent => event.type === "reasoning_step",
    );
    const stepsByKind: Record<string, number> = {};
    let totalToolCalls = 0;

    for (const step of steps) {
      stepsByKind[step.kind] = (stepsByKind[step.kind] ?? 0) + 1;
      totalToolCalls += step.toolCalls.length;
    }

    const first = steps[0];
    const last = steps[steps.length - 1];

    return {
      totalSteps: steps.length,
      stepsByKind,
      totalToolCalls,
      firstStepAtEpochMs: first?.atEpochMs,
      lastStepAtEpochMs: last?.atEpochMs,
      durationMs: first && last ? last.atEpochMs - first.atEpochMs : 0,
    };
  }

  toSnapshot(): ExecutionBranchSnapshot {
    return {
      id: this.id,
      resources: copyResources(this.resources),
      events: this.events.map((event) => structuredClone(event)),
    };
  }
}

export function createExecutionBranch(
  id: string,
  resources: BranchResources = {},
  options: ExecutionBranchOptions = {},
): ExecutionBranch {
  return new ImmutableExecutionBranch(id, freezeResources(resources), [], resolveClock(options));
}

export function restoreExecutionBranch(
  snapshot: unknown,
  options: ExecutionBranchOptions = {},
): OrchestratorResult<ExecutionBranch, OrchestratorValidationError> {
  const parsed = parseExecutionBranchSnapshot(snapshot);
  if (Result.isError(parsed)) return parsed;

  return Result.ok(
    new ImmutableExecutionBranch(
      parsed.value.id,
      freezeResources(parsed.value.resources),
      parsed.value.events.map(freezeEvent),
      resolveClock(options),
    ),
  );
}
