import { resolveEpicCoordinatorConfig, type EpicCoordinatorConfig } from "@taskforge/config";
import {
  OrchestratorCancelledError,
  OrchestratorPolicyError,
  OrchestratorRuntimeError,
  OrchestratorValidationError,
  WorkFunctionError,
  messageFromCause,
  type OrchestratorResult,
} from "@taskforge/core/errors";
import { childLogger, createSilentLogger, type Logger } from "@taskforge/core/logger";
import { Result } from "better-result";
import { createAgentRegistry, type Agent, type AgentRegistry } from "../agents";
import {
  createExecutionBranch,
  type BranchResources,
  type ExecutionBranch,
  type ExecutionBranchOptions,
} from "../branch";
import { createPermissionGuard, type OperationRequest, type PermissionGuard } from "../policy";
import { AdmissionGate } from "./admission-gate";
import { formatEpicProgress, summarizeEpicProgress } from "./progress";
import { validateAssignment } from "./schema";
import { isExecutableStatus, isStatusTransitionAllowed } from "./state-machine";
import type {
  BranchResourceResolver,
  Epic,
  EpicCoordinator,
  EpicCoordinatorOptions,
  EpicProgress,
  ExecuteSubTaskOptions,
  SubTaskAssignment,
  SubTaskExecutionResult,
  SubTaskStatus,
  WorkContext,
  WorkFunction,
  WorkResult,
} from "./types";

const STAGE = "epic_coordinator";

type StoreError = OrchestratorRuntimeError | OrchestratorValidationError;

type WorkOutcome =
  | { readonly kind: "settled"; readonly result: WorkResult }
  | { readonly kind: "cancelled" };

type StartFailure = OrchestratorPolicyError | OrchestratorCancelledError;

function failureMessage(error: StartFailure | WorkFunctionError): string {
  if (error.message.trim().length > 0) return error.message;
  const fromCause = error.cause === undefined ? "" : messageFromCause(error.cause);
  return fromCause.trim().length > 0 ? fromCause : `Sub-task failed (${error.code})`;
}

/** A returned branch must be the stored branch with zero or more events appended. */
export function extendsBranch(stored: ExecutionBranch, returned: ExecutionBranch): boolean {
  if (returned.id !== stored.id) return false;
  if (returned.events.length < stored.events.length) return false;
  return stored.events.every((event, index) => returned.events[index]?.id === event.id);
}

export function formatBranchName(
  config: Pick<EpicCoordinatorConfig, "branchPrefix">,
  epicId: string,
  subTaskId: string,
): string {
  return `${config.branchPrefix}-${epicId}/sub-task-${subTaskId}`;
}

export function formatAgentId(
  config: Pick<EpicCoordinatorConfig, "agentPoolPrefix">,
  epicId: string,
  subTaskId: string,
): string {
  return `${config.agentPoolPrefix}-${epicId}-${subTaskId}`;
}

function toUnknownEpicError(epicId: string): OrchestratorRuntimeError {
  return new OrchestratorRuntimeError({
    code: "unknown_epic",
    stage: STAGE,
    message: `Unknown epic id '${epicId}'`,
    meta: { epicId },
  });
}

function toUnknownAssignmentError(epicId: string, subTaskId: string): OrchestratorRuntimeError {
  return new OrchestratorRuntimeError({
    code: "unknown_assignment",
    stage: STAGE,
    message: `No assignment for sub-task '${subTaskId}' in epic '${epicId}'`,
    meta: { epicId, subTaskId },
  });
}

function toIllegalTransitionError(
  assignment: SubTaskAssignment,
  to: SubTaskStatus,
): OrchestratorRuntimeError {
  return new OrchestratorRuntimeError({
    code: "invalid_status_transition",
    stage: STAGE,
    message: `Illegal sub-task transition for '${assignment.epicId}/${assignment.subTaskId}': ${assignment.status} -> ${to}`,
    meta: {
      epicId: assignment.epicId,
      subTaskId: assignment.subTaskId,
      from: assignment.status,
      to,
    },
  });
}

function toExecutionError(
  cause: unknown,
): OrchestratorPolicyError | OrchestratorCancelledError | WorkFunctionError {
  if (OrchestratorPolicyError.is(cause)) return cause;
  if (OrchestratorCancelledError.is(cause)) return cause;
  if (WorkFunctionError.is(cause)) return cause;
  return new WorkFunctionError({ cause });
}

async function invokeWorkFunction(
  workFn: WorkFunction,
  assignment: SubTaskAssignment,
  context: WorkContext,
): Promise<WorkResult> {
  try {
    return await workFn(assignment, context);
  } catch (cause) {
    return Result.err(cause);
  }
}

/** Settles with whichever comes first: the work function or the abort signal. */
function runUntilSettledOrAborted(
  workFn: WorkFunction,
  assignment: SubTaskAssignment,
  context: WorkContext,
): Promise<WorkOutcome> {
  const { signal } = context;

  return new Promise((resolve) => {
    const onAbort = () => resolve({ kind: "cancelled" });
    if (signal.aborted) {
      onAbort();
      return;
    }

    signal.addEventListener("abort", onAbort, { once: true });
    void invokeWorkFunction(workFn, assignment, context).then((result) => {
      signal.removeEventListener("abort", onAbort);
      resolve({ kind: "settled", result });
    });
  });
}

class InMemoryEpicCoordinator implements EpicCoordinator {
  readonly config: EpicCoordinatorConfig;
  readonly registry: AgentRegistry;
  private readonly guard: PermissionGuard;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly branchOptions: ExecutionBranchOptions;
  private readonly resolveBranchResources: BranchResourceResolver;
  private readonly onAssignmentUpdate: ((assignment: SubTaskAssignment) => void) | undefined;
  private readonly epics = new Map<string, Epic>();
  private readonly assignments = new Map<string, Map<string, SubTaskAssignment>>();

  constructor(options: EpicCoordinatorOptions = {}) {
    this.config = resolveEpicCoordinatorConfig(options.config ?? {});
    this.now = options.now ?? (() => Date.now());
    this.logger = childLogger(options.logger ?? createSilentLogger(), STAGE);
    this.guard =
      options.guard ?? createPermissionGuard({ workingDirectory: this.config.workingDirectory });
    this.registry =
      options.registry ??
      createAgentRegistry({
        now: this.now,
        guard: this.guard,
        defaultPermissionLevel: this.config.defaultPermissionLevel,
        logger: options.logger,
      });
    this.branchOptions = {
      now: options.branchOptions?.now ?? this.now,
      createId: options.branchOptions?.createId,
    };

    const workingDirectory = this.guard.workingDirectory;
    this.resolveBranchResources =
      options.resolveBranchResources ??
      ((): BranchResources => ({ dataSource: { kind: "path", uri: workingDirectory } }));
    this.onAssignmentUpdate = options.onAssignmentUpdate;
  }

  registerEpic(
    epicId: string,
    title: string,
    description: string,
    subTaskIds: readonly string[],
  ): OrchestratorResult<Epic, StoreError> {
    if (epicId.trim().length === 0) {
      return Result.err(
        new OrchestratorValidationError({
          code: "invalid_identifier",
          path: "epicId",
          message: "Epic id must be a non-empty string",
        }),
      );
    }

    if (this.epics.has(epicId)) {
      return Result.err(
        new OrchestratorRuntimeError({
          code: "duplicate_epic",
          stage: STAGE,
          message: `Epic '${epicId}' is already registered`,
          meta: { epicId },
        }),
      );
    }

    if (subTaskIds.length === 0) {
      return Result.err(
        new OrchestratorValidationError({
          code: "empty_sub_task_list",
          path: "subTaskIds",
          message: `Epic '${epicId}' has no sub-tasks`,
          meta: { epicId },
        }),
      );
    }

    if (title.trim().length === 0) {
      return Result.err(
        new OrchestratorValidationError({
          code: "invalid_epic",
          path: "title",
          message: "Epic title must be a non-empty string",
          meta: { epicId },
        }),
      );
    }

    const seen = new Set<string>();
    for (const [index, subTaskId] of subTaskIds.entries()) {
      if (subTaskId.trim().length === 0) {
        return Result.err(
          new OrchestratorValidationError({
            code: "invalid_identifier",
            path: `subTaskIds.${index}`,
            message: "Sub-task id must be a non-empty string",
            meta: { epicId },
          }),
        );
      }

      if (seen.has(subTaskId)) {
        return Result.err(
          new OrchestratorValidationError({
            code: "invalid_epic",
            path: `subTaskIds.${index}`,
            message: `Duplicate sub-task id '${subTaskId}' in epic '${epicId}'`,
            meta: { epicId, subTaskId },
          }),
        );
      }
      seen.add(subTaskId);
    }

    const epic: Epic = Object.freeze({
      epicId,
      title,
      description,
      subTaskIds: Object.freeze([...subTaskIds]),
      createdAtEpochMs: this.now(),
    });

    const created: SubTaskAssignment[] = [];
    if (this.config.autoAssignAgents) {
      for (const subTaskId of epic.subTaskIds) {
        const validated = validateAssignment(this.createAssignment(epic, subTaskId));
        if (Result.isError(validated)) return validated;
        created.push(validated.value);
      }
    }

    this.epics.set(epicId, epic);
    this.assignments.set(epicId, new Map());
    for (const assignment of created) this.store(assignment);

    this.logger.info(
      { epicId, subTasks: epic.subTaskIds.length, assigned: created.length },
      "epic registered",
    );
    return Result.ok(epic);
  }

  assignSubTask(
    epicId: string,
    subTaskId: string,
    preferredAgentId?: string,
  ): OrchestratorResult<SubTaskAssignment, StoreError> {
    const epic = this.epics.get(epicId);
    if (!epic) return Result.err(toUnknownEpicError(epicId));

    if (!epic.subTaskIds.includes(subTaskId)) {
      return Result.err(
        new OrchestratorRuntimeError({
          code: "unknown_sub_task",
          stage: STAGE,
          message: `Sub-task '${subTaskId}' is not part of epic '${epicId}'`,
          meta: { epicId, subTaskId },
        }),
      );
    }

    const existing = this.getAssignment(epicId, subTaskId);
    if (existing?.status === "in_progress") {
      return Result.err(
        new OrchestratorRuntimeError({
          code: "assignment_in_progress",
          stage: STAGE,
          message: `Sub-task '${subTaskId}' in epic '${epicId}' is running and cannot be reassigned`,
          meta: { epicId, subTaskId, assignedAgentId: existing.assignedAgentId },
        }),
      );
    }

    const validated = validateAssignment(this.createAssignment(epic, subTaskId, preferredAgentId));
    if (Result.isError(validated)) return validated;

    this.store(validated.value);
    this.logger.info(
      { epicId, subTaskId, agentId: validated.value.assignedAgentId, replaced: existing !== undefined },
      "sub-task assigned",
    );
    return validated;
  }

  getEpic(epicId: string): Epic | undefined {
    return this.epics.get(epicId);
  }

  listEpics(): readonly Epic[] {
    return [...this.epics.values()];
  }

  getAssignments(epicId: string): readonly SubTaskAssignment[] {
    const epic = this.epics.get(epicId);
    const table = this.assignments.get(epicId);
    if (!epic || !table) return [];

    const ordered: SubTaskAssignment[] = [];
    for (const subTaskId of epic.subTaskIds) {
      const assignment = table.get(subTaskId);
      if (assignment) ordered.push(assignment);
    }
    return ordered;
  }

  getAssignment(epicId: string, subTaskId: string): SubTaskAssignment | undefined {
    return this.assignments.get(epicId)?.get(subTaskId);
  }

  summarizeEpic(epicId: string): OrchestratorResult<EpicProgress, OrchestratorRuntimeError> {
    const epic = this.epics.get(epicId);
    if (!epic) return Result.err(toUnknownEpicError(epicId));
    return Result.ok(summarizeEpicProgress(epic, this.getAssignments(epicId)));
  }

  updateStatus(
    epicId: string,
    subTaskId: string,
    status: SubTaskStatus,
    errorMessage?: string,
  ): OrchestratorResult<SubTaskAssignment, StoreError> {
    const current = this.getAssignment(epicId, subTaskId);
    if (!current) return Result.err(toUnknownAssignmentError(epicId, subTaskId));

    if (status === "failed" && (errorMessage === undefined || errorMessage.trim().length === 0)) {
      return Result.err(
        new OrchestratorValidationError({
          code: "missing_error_message",
          path: "errorMessage",
          message: `Failing sub-task '${subTaskId}' in epic '${epicId}' requires an error message`,
          meta: { epicId, subTaskId },
        }),
      );
    }

    return this.transition(current, status, { errorMessage });
  }

  async executeSubTask(
    epicId: string,
    subTaskId: string,
    workFn: WorkFunction,
    options: ExecuteSubTaskOptions = {},
  ): Promise<SubTaskExecutionResult> {
    const current = this.getAssignment(epicId, subTaskId);
    if (!current) return Result.err(toUnknownAssignmentError(epicId, subTaskId));

    if (!isExecutableStatus(current.status)) {
      return Result.err(toIllegalTransitionError(current, "in_progress"));
    }

    if (options.signal?.aborted) {
      return this.failBeforeStart(
        current,
        new OrchestratorCancelledError({
          message: `Sub-task '${subTaskId}' in epic '${epicId}' was cancelled before it started`,
          meta: { epicId, subTaskId },
        }),
      );
    }

    const agent = this.resolveAgent(current);
    const required = options.requires ?? [];
    if (required.length > 0) {
      const decision = this.authorizeAgent(agent, required);
      if (Result.isError(decision)) return this.failBeforeStart(current, decision.error);
    }

    let ready = current;
    if (ready.status === "pending") {
      const branched = this.transition(ready, "branch_created");
      if (Result.isError(branched)) return branched;
      ready = branched.value;
    }

    const running = this.transition(ready, "in_progress");
    if (Result.isError(running)) return running;

    const heartbeat = this.registry.heartbeat(agent.id);
    if (Result.isError(heartbeat)) {
      this.logger.warn({ agentId: agent.id, code: heartbeat.error.code }, "agent heartbeat failed");
    }

    const startedAtEpochMs = this.now();
    this.logger.info({ epicId, subTaskId, agentId: agent.id }, "sub-task started");

    const outcome = await runUntilSettledOrAborted(workFn, running.value, {
      epicId,
      agent,
      signal: options.signal ?? new AbortController().signal,
      authorize: (requests) => this.authorizeAgent(this.registry.getAgent(agent.id) ?? agent, requests),
    });

    const stored = this.getAssignment(epicId, subTaskId) ?? running.value;
    const durationMs = this.now() - startedAtEpochMs;

    if (outcome.kind === "cancelled") {
      const cancelled = new OrchestratorCancelledError({
        message: `Sub-task '${subTaskId}' in epic '${epicId}' was cancelled`,
        meta: { epicId, subTaskId },
      });
      this.logger.warn({ epicId, subTaskId, durationMs }, "sub-task cancelled");
      return this.fail(stored, cancelled);
    }

    if (Result.isError(outcome.result)) {
      const error = toExecutionError(outcome.result.error);
      this.logger.warn(
        { epicId, subTaskId, durationMs, code: error.code, error: error.message },
        "sub-task failed",
      );
      return this.fail(stored, error);
    }

    const returned = outcome.result.value;
    if (returned.epicId !== epicId || returned.subTaskId !== subTaskId) {
      return this.fail(
        stored,
        new WorkFunctionError({
          message: `Work function returned sub-task '${returned.epicId}/${returned.subTaskId}' instead of '${epicId}/${subTaskId}'`,
          meta: { epicId, subTaskId },
        }),
      );
    }

    const branch = returned.branch ?? stored.branch;
    if (branch && stored.branch && !extendsBranch(stored.branch, branch)) {
      return this.fail(
        stored,
        new WorkFunctionError({
          message: `Work function returned branch '${branch.id}' that does not extend '${stored.branch.id}' for sub-task '${epicId}/${subTaskId}'`,
          meta: { epicId, subTaskId, branchId: branch.id },
        }),
      );
    }

    const completed = this.transition(stored, "completed", { branch });
    if (Result.isOk(completed)) {
      this.logger.info({ epicId, subTaskId, durationMs }, "sub-task completed");
    }
    return completed;
  }

  async executeManyConcurrently(
    epicId: string,
    subTaskIds: readonly string[],
    workFn: WorkFunction,
    options: ExecuteSubTaskOptions = {},
  ): Promise<readonly SubTaskExecutionResult[]> {
    const gate = new AdmissionGate(this.config.maxConcurrentSubTasks);
    this.logger.debug(
      { epicId, subTasks: subTaskIds.length, maxConcurrent: gate.capacity },
      "batch started",
    );

    const results = await Promise.all(
      subTaskIds.map(async (subTaskId) => {
        const release = await gate.acquire(options.signal);
        // Without a permit the signal has aborted; executeSubTask fails the sub-task unstarted.
        if (!release) return this.executeSubTask(epicId, subTaskId, workFn, options);

        try {
          return await this.executeSubTask(epicId, subTaskId, workFn, options);
        } finally {
          release();
        }
      }),
    );

    const epic = this.epics.get(epicId);
    if (epic) {
      const progress = summarizeEpicProgress(epic, this.getAssignments(epicId));
      this.logger.info({ epicId, settled: progress.settled }, formatEpicProgress(progress));
    }
    return results;
  }

  private resolveAgent(assignment: SubTaskAssignment): Agent {
    return this.registry.getOrCreate(
      assignment.assignedAgentId,
      [`epic-${assignment.epicId}`, `sub-task-${assignment.subTaskId}`],
      this.config.defaultPermissionLevel,
    );
  }

  private authorizeAgent(
    agent: Agent,
    requests: readonly OperationRequest[],
  ): Result<true, OrchestratorPolicyError> {
    const decision = this.guard.evaluateAll(agent.permissionLevel, requests);
    if (Result.isError(decision)) {
      this.logger.warn(
        { agentId: agent.id, level: agent.permissionLevel, action: decision.error.action },
        "operation denied",
      );
    }
    return decision;
  }

  private createBranch(epicId: string, subTaskId: string, branchName: string): ExecutionBranch {
    return createExecutionBranch(
      branchName,
      this.resolveBranchResources(epicId, subTaskId),
      this.branchOptions,
    );
  }

  private createAssignment(
    epic: Epic,
    subTaskId: string,
    preferredAgentId?: string,
  ): SubTaskAssignment {
    const preferred = preferredAgentId?.trim();
    const agentId =
      preferred && preferred.length > 0 ? preferred : formatAgentId(this.config, epic.epicId, subTaskId);
    const agent = this.registry.getOrCreate(
      agentId,
      [`epic-${epic.epicId}`, `sub-task-${subTaskId}`],
      this.config.defaultPermissionLevel,
    );

    const now = this.now();
    const branchName = formatBranchName(this.config, epic.epicId, subTaskId);
    const branch = this.config.autoCreateBranches
      ? this.createBranch(epic.epicId, subTaskId, branchName)
      : undefined;

    return Object.freeze({
      epicId: epic.epicId,
      subTaskId,
      title: `Sub-task ${subTaskId}`,
      description: `Work item for epic ${epic.epicId}`,
      assignedAgentId: agent.id,
      branchName,
      ...(branch ? { branch } : {}),
      status: branch ? "branch_created" : "pending",
      createdAtEpochMs: now,
      updatedAtEpochMs: now,
    });
  }

  private transition(
    current: SubTaskAssignment,
    next: SubTaskStatus,
    options: {
      readonly branch?: ExecutionBranch;
      readonly errorCode?: SubTaskAssignment["errorCode"];
      readonly errorMessage?: string;
    } = {},
  ): OrchestratorResult<SubTaskAssignment, StoreError> {
    if (!isStatusTransitionAllowed(current.status, next)) {
      return Result.err(toIllegalTransitionError(current, next));
    }

    const now = this.now();
    const branch =
      options.branch ??
      current.branch ??
      (next === "branch_created"
        ? this.createBranch(current.epicId, current.subTaskId, current.branchName)
        : undefined);

    const nextAssignment: SubTaskAssignment = Object.freeze({
      epicId: current.epicId,
      subTaskId: current.subTaskId,
      title: current.title,
      description: current.description,
      assignedAgentId: current.assignedAgentId,
      branchName: current.branchName,
      ...(branch ? { branch } : {}),
      status: next,
      createdAtEpochMs: current.createdAtEpochMs,
      updatedAtEpochMs: now,
      ...(next === "completed" ? { completedAtEpochMs: now } : {}),
      ...(next === "failed" && options.errorCode !== undefined ? { errorCode: options.errorCode } : {}),
      ...(next === "failed" && options.errorMessage !== undefined
        ? { errorMessage: options.errorMessage }
        : {}),
    });

    const validated = validateAssignment(nextAssignment);
    if (Result.isError(validated)) return validated;

    this.store(validated.value);
    this.logger.debug(
      { epicId: current.epicId, subTaskId: current.subTaskId, from: current.status, to: next },
      "sub-task status changed",
    );
    return validated;
  }

  private fail(
    current: SubTaskAssignment,
    error: StartFailure | WorkFunctionError,
  ): SubTaskExecutionResult {
    const failed = this.transition(current, "failed", {
      errorCode: error.code,
      errorMessage: failureMessage(error),
    });
    if (Result.isError(failed)) return failed;
    return Result.err(error);
  }

  private failBeforeStart(current: SubTaskAssignment, error: StartFailure): SubTaskExecutionResult {
    this.logger.warn(
      { epicId: current.epicId, subTaskId: current.subTaskId, code: error.code },
      "sub-task not started",
    );
    return this.fail(current, error);
  }

  private store(assignment: SubTaskAssignment): void {
    let table = this.assignments.get(assignment.epicId);
    if (!table) {
      table = new Map();
      this.assignments.set(assignment.epicId, table);
    }
    table.set(assignment.subTaskId, assignment);

    if (!this.onAssignmentUpdate) return;
    try {
      this.onAssignmentUpdate(assignment);
    } catch (error) {
      this.logger.warn(
        { epicId: assignment.epicId, subTaskId: assignment.subTaskId, error: messageFromCause(error) },
        "assignment update hook failed",
      );
    }
  }
}

export function createEpicCoordinator(options: EpicCoordinatorOptions = {}): EpicCoordinator {
  return new InMemoryEpicCoordinator(options);
}
