import type { EpicCoordinatorConfig } from "@taskforge/config";
import type {
  OrchestratorCancelledError,
  OrchestratorErrorCode,
  OrchestratorPolicyError,
  OrchestratorResult,
  OrchestratorRuntimeError,
  OrchestratorValidationError,
  WorkFunctionError,
} from "@taskforge/core/errors";
import type { Logger } from "@taskforge/core/logger";
import type { Result } from "better-result";
import type { Agent, AgentRegistry } from "../agents";
import type { BranchResources, ExecutionBranch, ExecutionBranchOptions } from "../branch";
import type { OperationRequest, PermissionGuard } from "../policy";

export const SUB_TASK_STATUSES = [
  "pending",
  "branch_created",
  "in_progress",
  "completed",
  "failed",
] as const;

export type SubTaskStatus = (typeof SUB_TASK_STATUSES)[number];

export interface Epic {
  readonly epicId: string;
  readonly title: string;
  readonly description: string;
  readonly subTaskIds: readonly string[];
  readonly createdAtEpochMs: number;
}

export interface SubTaskAssignment {
  readonly epicId: string;
  readonly subTaskId: string;
  readonly title: string;
  readonly description: string;
  readonly assignedAgentId: string;
  readonly branchName: string;
  /** Absent only while `status` is `pending`, or after a failure before any branch existed. */
  readonly branch?: ExecutionBranch;
  readonly status: SubTaskStatus;
  readonly createdAtEpochMs: number;
  readonly updatedAtEpochMs: number;
  readonly completedAtEpochMs?: number;
  readonly errorCode?: OrchestratorErrorCode;
  readonly errorMessage?: string;
}

export type AuthorizeOperations = (
  requests: readonly OperationRequest[],
) => Result<true, OrchestratorPolicyError | OrchestratorRuntimeError>;

export interface WorkContext {
  readonly epicId: string;
  readonly agent: Agent;
  readonly signal: AbortSignal;
  /** Checks operations decided at run time against the agent's permission level. */
  readonly authorize: AuthorizeOperations;
}

export type WorkResult = Result<SubTaskAssignment, unknown>;

export type WorkFunction = (
  assignment: SubTaskAssignment,
  context: WorkContext,
) => WorkResult | Promise<WorkResult>;

export interface ExecuteSubTaskOptions {
  readonly signal?: AbortSignal;
  /** Operations the work function will perform, checked before it runs. */
  readonly requires?: readonly OperationRequest[];
}

export type SubTaskExecutionError =
  | OrchestratorRuntimeError
  | OrchestratorValidationError
  | OrchestratorPolicyError
  | OrchestratorCancelledError
  | WorkFunctionError;

export type SubTaskExecutionResult = OrchestratorResult<SubTaskAssignment, SubTaskExecutionError>;

export interface SubTaskFailure {
  readonly subTaskId: string;
  readonly errorCode?: OrchestratorErrorCode;
  readonly errorMessage: string;
}

export interface EpicProgress {
  readonly epicId: string;
  readonly totalSubTasks: number;
  readonly unassigned: number;
  readonly counts: Readonly<Record<SubTaskStatus, number>>;
  readonly completionRatio: number;
  readonly settled: boolean;
  readonly failures: readonly SubTaskFailure[];
}

export type BranchResourceResolver = (epicId: string, subTaskId: string) => BranchResources;

export interface EpicCoordinatorOptions {
  readonly config?: Partial<EpicCoordinatorConfig>;
  readonly registry?: AgentRegistry;
  readonly guard?: PermissionGuard;
  readonly logger?: Logger;
  readonly now?: () => number;
  readonly branchOptions?: ExecutionBranchOptions;
  readonly resolveBranchResources?: BranchResourceResolver;
  /** Called after every stored change to an assignment. */
  readonly onAssignmentUpdate?: (assignment: SubTaskAssignment) => void;
}

export interface EpicCoordinator {
  readonly config: EpicCoordinatorConfig;
  readonly registry: AgentRegistry;
  registerEpic(
    epicId: string,
    title: string,
    description: string,
    subTaskIds: readonly string[],
  ): OrchestratorResult<Epic, OrchestratorRuntimeError | OrchestratorValidationError>;
  assignSubTask(
    epicId: string,
    subTaskId: string,
    preferredAgentId?: string,
  ): OrchestratorResult<SubTaskAssignment, OrchestratorRuntimeError | OrchestratorValidationError>;
  getEpic(epicId: string): Epic | undefined;
  listEpics(): readonly Epic[];
  getAssignments(epicId: string): readonly SubTaskAssignment[];
  getAssignment(epicId: string, subTaskId: string): SubTaskAssignment | undefined;
  summarizeEpic(epicId: string): OrchestratorResult<EpicProgress, OrchestratorRuntimeError>;
  updateStatus(
    epicId: string,
    subTaskId: string,
    status: SubTaskStatus,
    errorMessage?: string,
  ): OrchestratorResult<SubTaskAssignment, OrchestratorRuntimeError | OrchestratorValidationError>;
  executeSubTask(
    epicId: string,
    subTaskId: string,
    workFn: WorkFunction,
    options?: ExecuteSubTaskOptions,
  ): Promise<SubTaskExecutionResult>;
  executeManyConcurrently(
    epicId: string,
    subTaskIds: readonly string[],
    workFn: WorkFunction,
    options?: ExecuteSubTaskOptions,
  ): Promise<readonly SubTaskExecutionResult[]>;
}
