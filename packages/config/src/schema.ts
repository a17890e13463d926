import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { OrchestratorValidationError } from "@taskforge/core/errors";
import { ORCHESTRATOR_LOG_LEVELS } from "@taskforge/core/logger";
import { Result } from "better-result";

export const PERMISSION_LEVELS = ["isolated", "sandboxed", "trusted"] as const;
export type PermissionLevel = (typeof PERMISSION_LEVELS)[number];

const NonEmptyStringSchema = Type.String({ minLength: 1 });
const PositiveIntegerSchema = Type.Integer({ minimum: 1 });

export const PermissionLevelSchema = Type.Union(
  PERMISSION_LEVELS.map((level) => Type.Literal(level)),
);

export const LogLevelSchema = Type.Union(
  ORCHESTRATOR_LOG_LEVELS.map((level) => Type.Literal(level)),
);

export const EpicCoordinatorConfigPatchSchema = Type.Object(
  {
    branchPrefix: Type.Optional(NonEmptyStringSchema),
    agentPoolPrefix: Type.Optional(NonEmptyStringSchema),
    autoCreateBranches: Type.Optional(Type.Boolean()),
    autoAssignAgents: Type.Optional(Type.Boolean()),
    maxConcurrentSubTasks: Type.Optional(PositiveIntegerSchema),
    defaultPermissionLevel: Type.Optional(PermissionLevelSchema),
    workingDirectory: Type.Optional(NonEmptyStringSchema),
  },
  { additionalProperties: false },
);

export const AgentRegistryConfigPatchSchema = Type.Object(
  {
    heartbeatTimeoutMs: Type.Optional(PositiveIntegerSchema),
    defaultCapabilities: Type.Optional(Type.Array(NonEmptyStringSchema)),
  },
  { additionalProperties: false },
);

export const OrchestratorConfigPatchSchema = Type.Object(
  {
    $schema: Type.Optional(Type.String()),
    logLevel: Type.Optional(LogLevelSchema),
    coordinator: Type.Optional(EpicCoordinatorConfigPatchSchema),
    agents: Type.Optional(AgentRegistryConfigPatchSchema),
  },
  { additionalProperties: false },
);

export type EpicCoordinatorConfigPatch = Static<typeof EpicCoordinatorConfigPatchSchema>;
export type AgentRegistryConfigPatch = Static<typeof AgentRegistryConfigPatchSchema>;
export type OrchestratorConfigPatch = Static<typeof OrchestratorConfigPatchSchema>;

export function isPermissionLevel(value: unknown): value is PermissionLevel {
  return typeof value === "string" && PERMISSION_LEVELS.some((level) => level === value);
}

/** Turns a TypeBox JSON pointer (`/coordinator/branchPrefix`) into a dotted field path. */
export function pointerToFieldPath(pointer: string | undefined): string | undefined {
  const segments = (pointer ?? "")
    .split("/")
    .filter((segment) => segment.length > 0)
    .map((segment) => segment.replaceAll("~1", "/").replaceAll("~0", "~"));
  return segments.length > 0 ? segments.join(".") : undefined;
}

export function parseOrchestratorConfigPatch(
  input: unknown,
  source: string,
): Result<OrchestratorConfigPatch, OrchestratorValidationError> {
  if (Value.Check(OrchestratorConfigPatchSchema, input)) {
    return Result.ok(input);
  }

  const firstError = Value.Errors(OrchestratorConfigPatchSchema, input).First();
  const path = pointerToFieldPath(firstError?.path);
  const detail = firstError ? `${path ?? "(root)"}: ${firstError.message}` : "unknown shape";

  return Result.err(
    new OrchestratorValidationError({
      code: "invalid_config",
      path,
      message: `Invalid orchestrator config in ${source} (${detail})`,
      meta: { source },
    }),
  );
}
