import {
  OrchestratorValidationError,
  type OrchestratorResult,
  type OrchestratorValidationCode,
} from "@taskforge/core/errors";
import { Result } from "better-result";
import type { z } from "zod";

function issuePath(issue: z.core.$ZodIssue | undefined): string | undefined {
  if (!issue) return undefined;
  const segments = issue.path.map(String).filter((segment) => segment.length > 0);
  return segments.length > 0 ? segments.join(".") : undefined;
}

/** Parses `input`; the error message names the first failing field path. */
export function parseWithSchema<Schema extends z.ZodType>(
  schema: Schema,
  input: unknown,
  code: OrchestratorValidationCode,
  label: string,
): OrchestratorResult<z.output<Schema>, OrchestratorValidationError> {
  const parsed = schema.safeParse(input);
  if (parsed.success) return Result.ok(parsed.data);

  const path = issuePath(parsed.error.issues[0]);
  return Result.err(
    new OrchestratorValidationError({
      code,
      path,
      message: path ? `${label} failed validation: ${path}` : `${label} failed validation`,
      cause: parsed.error,
    }),
  );
}
