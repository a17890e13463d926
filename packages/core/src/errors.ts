import { TaggedError, type Result } from "better-result";

export type OrchestratorErrorMeta = Record<string, unknown>;

export type OrchestratorValidationCode =
  | "empty_sub_task_list"
  | "invalid_epic"
  | "invalid_assignment_record"
  | "invalid_branch_event"
  | "missing_error_message"
  | "invalid_config"
  | "invalid_identifier";

export type OrchestratorRuntimeCode =
  | "duplicate_epic"
  | "duplicate_agent"
  | "unknown_epic"
  | "unknown_sub_task"
  | "unknown_assignment"
  | "unknown_agent"
  | "invalid_status_transition"
  | "assignment_in_progress";

export type OrchestratorErrorCode =
  | OrchestratorValidationCode
  | OrchestratorRuntimeCode
  | "permission_denied"
  | "cancelled"
  | "work_function_failed";

export function messageFromCause(cause: unknown): string {
  if (cause instanceof Error && cause.message.trim().length > 0) return cause.message;
  if (typeof cause === "string" && cause.trim().length > 0) return cause;
  return String(cause);
}

export class OrchestratorValidationError extends TaggedError("OrchestratorValidationError")<{
  code: OrchestratorValidationCode;
  message: string;
  path?: string;
  cause?: unknown;
  meta?: OrchestratorErrorMeta;
}>() {
  constructor(args: {
    code: OrchestratorValidationCode;
    path?: string;
    message?: string;
    cause?: unknown;
    meta?: OrchestratorErrorMeta;
  }) {
    const derivedMessage =
      args.message ??
      (args.cause
        ? `Validation failed (${args.code}): ${messageFromCause(args.cause)}`
        : `Validation failed (${args.code})`);

    super({
      code: args.code,
      path: args.path,
      cause: args.cause,
      meta: args.meta,
      message: derivedMessage,
    });
  }
}

export class OrchestratorPolicyError extends TaggedError("OrchestratorPolicyError")<{
  code: "permission_denied";
  message: string;
  action?: string;
  cause?: unknown;
  meta?: OrchestratorErrorMeta;
}>() {
  constructor(args: {
    action?: string;
    message?: string;
    cause?: unknown;
    meta?: OrchestratorErrorMeta;
  }) {
    const derivedMessage =
      args.message ??
      (args.action
        ? `Policy denied (permission_denied): ${args.action}`
        : "Policy denied (permission_denied)");

    super({
      code: "permission_denied",
      action: args.action,
      cause: args.cause,
      meta: args.meta,
      message: derivedMessage,
    });
  }
}

export class OrchestratorRuntimeError extends TaggedError("OrchestratorRuntimeError")<{
  code: OrchestratorRuntimeCode;
  message: string;
  stage?: string;
  cause?: unknown;
  meta?: OrchestratorErrorMeta;
}>() {
  constructor(args: {
    code: OrchestratorRuntimeCode;
    stage?: string;
    message?: string;
    cause?: unknown;
    meta?: OrchestratorErrorMeta;
  }) {
    const derivedMessage =
      args.message ??
      (args.cause
        ? `Runtime failure (${args.code}): ${messageFromCause(args.cause)}`
        : `Runtime failure (${args.code})`);

    super({
      code: args.code,
      stage: args.stage,
      cause: args.cause,
      meta: args.meta,
      message: derivedMessage,
    });
  }
}

export class OrchestratorCancelledError extends TaggedError("OrchestratorCancelledError")<{
  code: "cancelled";
  message: string;
  cause?: unknown;
  meta?: OrchestratorErrorMeta;
}>() {
  constructor(args: { message?: string; cause?: unknown; meta?: OrchestratorErrorMeta } = {}) {
    super({
      code: "cancelled",
      cause: args.cause,
      meta: args.meta,
      message: args.message ?? "Cancelled",
    });
  }
}

/** Wraps whatever a caller-supplied work function reported or threw. */
export class WorkFunctionError extends TaggedError("WorkFunctionError")<{
  code: "work_function_failed";
  message: string;
  cause?: unknown;
  meta?: OrchestratorErrorMeta;
}>() {
  constructor(args: { message?: string; cause?: unknown; meta?: OrchestratorErrorMeta }) {
    const derivedMessage =
      args.message ??
      (args.cause !== undefined ? messageFromCause(args.cause) : "Work function failed");

    super({
      code: "work_function_failed",
      cause: args.cause,
      meta: args.meta,
      message: derivedMessage,
    });
  }
}

export type OrchestratorError =
  | OrchestratorValidationError
  | OrchestratorPolicyError
  | OrchestratorRuntimeError
  | OrchestratorCancelledError
  | WorkFunctionError;

export type OrchestratorResult<T, E extends OrchestratorError = OrchestratorError> = Result<T, E>;

export function isOrchestratorError(value: unknown): value is OrchestratorError {
  return (
    OrchestratorValidationError.is(value) ||
    OrchestratorPolicyError.is(value) ||
    OrchestratorRuntimeError.is(value) ||
    OrchestratorCancelledError.is(value) ||
    WorkFunctionError.is(value)
  );
}
