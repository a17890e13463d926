import type { OrchestratorResult, OrchestratorValidationError } from "@taskforge/core/errors";
import { Result } from "better-result";
import { z } from "zod";
import { parseWithSchema } from "../validation";
import type { SubTaskAssignment } from "./types";

const NonEmptyString = z.string().trim().min(1);
const EpochMs = z.int().nonnegative();

const BaseAssignmentRecordSchema = z.strictObject({
  epicId: NonEmptyString,
  subTaskId: NonEmptyString,
  title: NonEmptyString,
  description: z.string(),
  assignedAgentId: NonEmptyString,
  branchName: NonEmptyString,
  createdAtEpochMs: EpochMs,
  updatedAtEpochMs: EpochMs,
});

const PendingAssignmentRecordSchema = BaseAssignmentRecordSchema.extend({
  status: z.literal("pending"),
  branchId: z.undefined().optional(),
  completedAtEpochMs: z.undefined().optional(),
  errorCode: z.undefined().optional(),
  errorMessage: z.undefined().optional(),
});

const ActiveAssignmentRecordSchema = BaseAssignmentRecordSchema.extend({
  status: z.enum(["branch_created", "in_progress"]),
  branchId: NonEmptyString,
  completedAtEpochMs: z.undefined().optional(),
  errorCode: z.undefined().optional(),
  errorMessage: z.undefined().optional(),
});

const CompletedAssignmentRecordSchema = BaseAssignmentRecordSchema.extend({
  status: z.literal("completed"),
  branchId: NonEmptyString,
  completedAtEpochMs: EpochMs,
  errorCode: z.undefined().optional(),
  errorMessage: z.undefined().optional(),
}).superRefine((record, ctx) => {
  if (record.completedAtEpochMs < record.createdAtEpochMs) {
    ctx.addIssue({
      code: "custom",
      message: "completedAtEpochMs must be >= createdAtEpochMs",
      path: ["completedAtEpochMs"],
    });
  }
});

const FailedAssignmentRecordSchema = BaseAssignmentRecordSchema.extend({
  status: z.literal("failed"),
  branchId: NonEmptyString.optional(),
  completedAtEpochMs: z.undefined().optional(),
  errorCode: NonEmptyString.optional(),
  errorMessage: NonEmptyString,
});

export const AssignmentRecordSchema = z.discriminatedUnion("status", [
  PendingAssignmentRecordSchema,
  ActiveAssignmentRecordSchema,
  CompletedAssignmentRecordSchema,
  FailedAssignmentRecordSchema,
]);

/** Serializable view of an assignment; the branch is referenced by id. */
export type AssignmentRecord = z.infer<typeof AssignmentRecordSchema>;

export function toAssignmentRecord(assignment: SubTaskAssignment): Record<string, unknown> {
  return {
    epicId: assignment.epicId,
    subTaskId: assignment.subTaskId,
    title: assignment.title,
    description: assignment.description,
    assignedAgentId: assignment.assignedAgentId,
    branchName: assignment.branchName,
    createdAtEpochMs: assignment.createdAtEpochMs,
    updatedAtEpochMs: assignment.updatedAtEpochMs,
    status: assignment.status,
    ...(assignment.branch ? { branchId: assignment.branch.id } : {}),
    ...(assignment.completedAtEpochMs !== undefined
      ? { completedAtEpochMs: assignment.completedAtEpochMs }
      : {}),
    ...(assignment.errorCode !== undefined ? { errorCode: assignment.errorCode } : {}),
    ...(assignment.errorMessage !== undefined ? { errorMessage: assignment.errorMessage } : {}),
  };
}

export function parseAssignmentRecord(
  input: unknown,
): OrchestratorResult<AssignmentRecord, OrchestratorValidationError> {
  return parseWithSchema(
    AssignmentRecordSchema,
    input,
    "invalid_assignment_record",
    "Assignment record",
  );
}

export function validateAssignment(
  assignment: SubTaskAssignment,
): OrchestratorResult<SubTaskAssignment, OrchestratorValidationError> {
  const parsed = parseAssignmentRecord(toAssignmentRecord(assignment));
  if (Result.isError(parsed)) return parsed;
  return Result.ok(assignment);
}
