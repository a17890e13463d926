import path from "node:path";
import type { PermissionLevel } from "@taskforge/config";
import { OrchestratorPolicyError } from "@taskforge/core/errors";
import { Result } from "better-result";

export type OperationKind = "side_effect_free" | "scoped" | "unrestricted";

export interface OperationRequest {
  readonly action: string;
  /** Overrides classification by action name. */
  readonly kind?: OperationKind;
  /** Filesystem path or resource locator the operation touches. */
  readonly resource?: string;
}

export interface PermissionGuardOptions {
  readonly workingDirectory?: string;
  readonly operations?: Readonly<Record<string, OperationKind>>;
}

export interface PermissionGuard {
  readonly workingDirectory: string;
  classify(action: string): OperationKind;
  resolveKind(request: OperationRequest): OperationKind;
  evaluate(level: PermissionLevel, request: OperationRequest): Result<true, OrchestratorPolicyError>;
  evaluateAll(
    level: PermissionLevel,
    requests: readonly OperationRequest[],
  ): Result<true, OrchestratorPolicyError>;
}

const SIDE_EFFECT_FREE_PATTERNS = ["read", "get", "list", "search", "inspect", "query", "find"];
const SCOPED_PATTERNS = ["write", "update", "create", "edit", "patch", "append"];
const UNRESTRICTED_PATTERNS = ["delete", "remove", "drop", "system", "admin", "exec", "shell"];

export function isAllowed(level: PermissionLevel, kind: OperationKind): boolean {
  if (level === "trusted") return true;
  if (level === "sandboxed") return kind === "side_effect_free" || kind === "scoped";
  return kind === "side_effect_free";
}

function normalizeAction(action: string): string {
  return action.trim().toLowerCase();
}

function tokenizeAction(action: string): readonly string[] {
  return action
    .replace(/([a-z0-9])([A-Z])/gu, "$1 $2")
    .toLowerCase()
    .split(/[^a-z0-9]+/u)
    .filter((token) => token.length > 0);
}

function matchesAny(tokens: readonly string[], patterns: readonly string[]): boolean {
  return tokens.some((token) => patterns.includes(token));
}

function normalizeOperationMap(
  value: Readonly<Record<string, OperationKind>> | undefined,
): ReadonlyMap<string, OperationKind> {
  const entries = new Map<string, OperationKind>();
  if (!value) return entries;

  for (const [action, kind] of Object.entries(value)) {
    const normalized = normalizeAction(action);
    if (normalized.length === 0) continue;
    entries.set(normalized, kind);
  }

  return entries;
}

export function classifyAction(
  action: string,
  overrides: ReadonlyMap<string, OperationKind> = new Map(),
): OperationKind {
  const explicit = overrides.get(normalizeAction(action));
  if (explicit) return explicit;

  const tokens = tokenizeAction(action);
  // Destructive words win over read words ("list_and_delete"), write words over read words.
  if (matchesAny(tokens, UNRESTRICTED_PATTERNS)) return "unrestricted";
  if (matchesAny(tokens, SCOPED_PATTERNS)) return "scoped";
  if (matchesAny(tokens, SIDE_EFFECT_FREE_PATTERNS)) return "side_effect_free";
  return "unrestricted";
}

export function isWithinDirectory(root: string, resource: string): boolean {
  const resolvedRoot = path.resolve(root);
  const resolvedResource = path.resolve(resolvedRoot, resource);
  const relative = path.relative(resolvedRoot, resolvedResource);
  if (relative.length === 0) return true;
  if (relative === ".." || relative.startsWith(`..${path.sep}`)) return false;
  return !path.isAbsolute(relative);
}

export function createPermissionGuard(options: PermissionGuardOptions = {}): PermissionGuard {
  const workingDirectory = path.resolve(options.workingDirectory ?? process.cwd());
  const overrides = normalizeOperationMap(options.operations);

  const resolveKind = (request: OperationRequest): OperationKind => {
    const kind = request.kind ?? classifyAction(request.action, overrides);
    if (kind !== "scoped" || request.resource === undefined) return kind;
    return isWithinDirectory(workingDirectory, request.resource) ? "scoped" : "unrestricted";
  };

  const evaluate = (
    level: PermissionLevel,
    request: OperationRequest,
  ): Result<true, OrchestratorPolicyError> => {
    const kind = resolveKind(request);
    if (isAllowed(level, kind)) return Result.ok(true);

    return Result.err(
      new OrchestratorPolicyError({
        action: request.action,
        message: `Operation '${request.action}' (${kind}) is not permitted at level '${level}'`,
        meta: {
          level,
          kind,
          ...(request.resource !== undefined ? { resource: request.resource } : {}),
        },
      }),
    );
  };

  return {
    workingDirectory,
    classify: (action) => classifyAction(action, overrides),
    resolveKind,
    evaluate,
    evaluateAll(level, requests) {
      for (const request of requests) {
        const decision = evaluate(level, request);
        if (Result.isError(decision)) return decision;
      }
      return Result.ok(true);
    },
  };
}
