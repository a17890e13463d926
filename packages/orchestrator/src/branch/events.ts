import type { OrchestratorResult, OrchestratorValidationError } from "@taskforge/core/errors";
import { z } from "zod";
import { parseWithSchema } from "../validation";

const NonEmptyString = z.string().trim().min(1);
const EpochMs = z.int().nonnegative();

export const ExternalResourceRefSchema = z.strictObject({
  kind: NonEmptyString,
  uri: NonEmptyString,
});

/**
 * Opaque pointer to something the branch does not own, such as a retrieval
 * store or a data source. The branch carries it along and never calls it.
 */
export type ExternalResourceRef = z.infer<typeof ExternalResourceRefSchema>;

export const BranchResourcesSchema = z.strictObject({
  retrievalStore: ExternalResourceRefSchema.optional(),
  dataSource: ExternalResourceRefSchema.optional(),
});

export type BranchResources = z.infer<typeof BranchResourcesSchema>;

const ReasoningStepEventSchema = z.strictObject({
  type: z.literal("reasoning_step"),
  id: NonEmptyString,
  kind: NonEmptyString,
  state: z.string(),
  prompt: z.string(),
  toolCalls: z.array(NonEmptyString),
  atEpochMs: EpochMs,
});

const IngestEventSchema = z.strictObject({
  type: z.literal("ingest"),
  id: NonEmptyString,
  source: NonEmptyString,
  itemIds: z.array(NonEmptyString),
  atEpochMs: EpochMs,
});

const StepExecutionEventSchema = z
  .strictObject({
    type: z.literal("step_execution"),
    id: NonEmptyString,
    action: NonEmptyString,
    status: z.enum(["success", "error"]),
    output: z.string().optional(),
    error: NonEmptyString.optional(),
    durationMs: z.int().nonnegative(),
    atEpochMs: EpochMs,
  })
  .superRefine((event, ctx) => {
    if (event.status === "error" && !event.error) {
      ctx.addIssue({
        code: "custom",
        message: "Failed step executions require error",
        path: ["error"],
      });
    }
  });

export const BranchEventSchema = z.discriminatedUnion("type", [
  ReasoningStepEventSchema,
  IngestEventSchema,
  StepExecutionEventSchema,
]);

export type BranchEvent = z.infer<typeof BranchEventSchema>;
export type BranchEventType = BranchEvent["type"];
export type ReasoningStepEvent = Extract<BranchEvent, { type: "reasoning_step" }>;
export type IngestEvent = Extract<BranchEvent, { type: "ingest" }>;
export type StepExecutionEvent = Extract<BranchEvent, { type: "step_execution" }>;

export function parseBranchEvent(
  input: unknown,
): OrchestratorResult<BranchEvent, OrchestratorValidationError> {
  return parseWithSchema(BranchEventSchema, input, "invalid_branch_event", "Branch event");
}

export const ExecutionBranchSnapshotSchema = z.strictObject({
  id: NonEmptyString,
  resources: BranchResourcesSchema,
  events: z.array(BranchEventSchema),
});

export type ExecutionBranchSnapshot = z.infer<typeof ExecutionBranchSnapshotSchema>;

export function parseExecutionBranchSnapshot(
  input: unknown,
): OrchestratorResult<ExecutionBranchSnapshot, OrchestratorValidationError> {
  return parseWithSchema(
    ExecutionBranchSnapshotSchema,
    input,
    "invalid_branch_event",
    "Branch snapshot",
  );
}
