import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { OrchestratorValidationError } from "@taskforge/core/errors";
import { isOrchestratorLogLevel, type OrchestratorLogLevel } from "@taskforge/core/logger";
import { Result } from "better-result";
import {
  isPermissionLevel,
  parseOrchestratorConfigPatch,
  type OrchestratorConfigPatch,
  type PermissionLevel,
} from "./schema";

export const ORCHESTRATOR_CONFIG_FILE_NAME = "orchestrator.json";

export interface EpicCoordinatorConfig {
  readonly branchPrefix: string;
  readonly agentPoolPrefix: string;
  readonly autoCreateBranches: boolean;
  readonly autoAssignAgents: boolean;
  readonly maxConcurrentSubTasks: number;
  readonly defaultPermissionLevel: PermissionLevel;
  /** Scope for `sandboxed` agents; process cwd when unset. */
  readonly workingDirectory?: string;
}

export interface AgentRegistryConfig {
  readonly heartbeatTimeoutMs: number;
  readonly defaultCapabilities: readonly string[];
}

export interface OrchestratorRuntimeConfig {
  readonly logLevel: OrchestratorLogLevel;
  readonly coordinator: EpicCoordinatorConfig;
  readonly agents: AgentRegistryConfig;
}

export interface OrchestratorConfigPaths {
  readonly configDir: string;
  readonly projectConfigFile: string;
  readonly globalConfigFile: string;
}

export interface LoadedOrchestratorRuntimeConfig {
  readonly config: OrchestratorRuntimeConfig;
  readonly paths: OrchestratorConfigPaths;
  readonly loadedFrom: readonly string[];
}

export interface LoadOrchestratorConfigOptions {
  readonly env?: NodeJS.ProcessEnv;
}

export const DEFAULT_EPIC_COORDINATOR_CONFIG: EpicCoordinatorConfig = {
  branchPrefix: "epic",
  agentPoolPrefix: "sub-task-agent",
  autoCreateBranches: true,
  autoAssignAgents: true,
  maxConcurrentSubTasks: 4,
  defaultPermissionLevel: "sandboxed",
};

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorRuntimeConfig = {
  logLevel: "info",
  coordinator: DEFAULT_EPIC_COORDINATOR_CONFIG,
  agents: {
    heartbeatTimeoutMs: 1000 * 60 * 5,
    defaultCapabilities: [],
  },
};

function expandHome(value: string): string {
  if (value === "~") return os.homedir();
  if (value.startsWith("~/")) return path.join(os.homedir(), value.slice(2));
  return value;
}

export function resolveOrchestratorConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const envDir = env.TASKFORGE_CONFIG_DIR;

  if (envDir && envDir.trim().length > 0) {
    return expandHome(envDir.trim());
  }

  return path.join(os.homedir(), ".taskforge");
}

export function resolveOrchestratorConfigPaths(
  cwd: string,
  env: NodeJS.ProcessEnv = process.env,
): OrchestratorConfigPaths {
  const configDir = resolveOrchestratorConfigDir(env);
  return {
    configDir,
    projectConfigFile: path.join(cwd, ".taskforge", ORCHESTRATOR_CONFIG_FILE_NAME),
    globalConfigFile: path.join(configDir, ORCHESTRATOR_CONFIG_FILE_NAME),
  };
}

function isMissingFileError(cause: unknown): boolean {
  return cause instanceof Error && "code" in cause && cause.code === "ENOENT";
}

async function readConfigPatch(
  filePath: string,
): Promise<Result<OrchestratorConfigPatch | undefined, OrchestratorValidationError>> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (cause) {
    if (isMissingFileError(cause)) return Result.ok(undefined);
    return Result.err(
      new OrchestratorValidationError({
        code: "invalid_config",
        message: `Failed reading orchestrator config at ${filePath}`,
        cause,
        meta: { source: filePath },
      }),
    );
  }

  const parsed = Result.try({
    try: (): unknown => JSON.parse(raw),
    catch: (cause) =>
      new OrchestratorValidationError({
        code: "invalid_config",
        message: `Orchestrator config at ${filePath} is not valid JSON`,
        cause,
        meta: { source: filePath },
      }),
  });
  if (Result.isError(parsed)) return parsed;

  return parseOrchestratorConfigPatch(parsed.value, filePath);
}

export function mergeOrchestratorConfig(
  base: OrchestratorRuntimeConfig,
  patch: OrchestratorConfigPatch,
): OrchestratorRuntimeConfig {
  return {
    logLevel: patch.logLevel ?? base.logLevel,
    coordinator: {
      ...base.coordinator,
      ...patch.coordinator,
    },
    agents: {
      heartbeatTimeoutMs: patch.agents?.heartbeatTimeoutMs ?? base.agents.heartbeatTimeoutMs,
      defaultCapabilities: patch.agents?.defaultCapabilities ?? base.agents.defaultCapabilities,
    },
  };
}

function normalizePositiveInteger(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (!/^\d+$/u.test(trimmed)) return undefined;

  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) return undefined;
  return parsed;
}

export function applyEnvironmentOverrides(
  config: OrchestratorRuntimeConfig,
  env: NodeJS.ProcessEnv,
): OrchestratorRuntimeConfig {
  const logLevel = env.TASKFORGE_LOG_LEVEL?.trim().toLowerCase();
  const maxConcurrentSubTasks = normalizePositiveInteger(env.TASKFORGE_MAX_CONCURRENT_SUB_TASKS);
  const permissionLevel = env.TASKFORGE_DEFAULT_PERMISSION_LEVEL?.trim().toLowerCase();

  return {
    ...config,
    logLevel: isOrchestratorLogLevel(logLevel) ? logLevel : config.logLevel,
    coordinator: {
      ...config.coordinator,
      maxConcurrentSubTasks: maxConcurrentSubTasks ?? config.coordinator.maxConcurrentSubTasks,
      defaultPermissionLevel: isPermissionLevel(permissionLevel)
        ? permissionLevel
        : config.coordinator.defaultPermissionLevel,
    },
  };
}

/**
 * Fills a partial coordinator config from defaults. The result is frozen and
 * `maxConcurrentSubTasks` is at least 1.
 */
export function resolveEpicCoordinatorConfig(
  partial: Partial<EpicCoordinatorConfig> = {},
): Readonly<EpicCoordinatorConfig> {
  const defaults = DEFAULT_EPIC_COORDINATOR_CONFIG;
  const requestedConcurrency = partial.maxConcurrentSubTasks ?? defaults.maxConcurrentSubTasks;
  const maxConcurrentSubTasks = Number.isFinite(requestedConcurrency)
    ? Math.max(1, Math.floor(requestedConcurrency))
    : defaults.maxConcurrentSubTasks;

  const resolved: EpicCoordinatorConfig = {
    branchPrefix: partial.branchPrefix ?? defaults.branchPrefix,
    agentPoolPrefix: partial.agentPoolPrefix ?? defaults.agentPoolPrefix,
    autoCreateBranches: partial.autoCreateBranches ?? defaults.autoCreateBranches,
    autoAssignAgents: partial.autoAssignAgents ?? defaults.autoAssignAgents,
    maxConcurrentSubTasks,
    defaultPermissionLevel: partial.defaultPermissionLevel ?? defaults.defaultPermissionLevel,
    ...(partial.workingDirectory ? { workingDirectory: partial.workingDirectory } : {}),
  };

  return Object.freeze(resolved);
}

export async function loadOrchestratorConfig(
  cwd: string,
  options: LoadOrchestratorConfigOptions = {},
): Promise<Result<LoadedOrchestratorRuntimeConfig, OrchestratorValidationError>> {
  const env = options.env ?? process.env;
  const paths = resolveOrchestratorConfigPaths(cwd, env);
  const loadedFrom: string[] = [];
  let config = DEFAULT_ORCHESTRATOR_CONFIG;

  for (const filePath of [paths.globalConfigFile, paths.projectConfigFile]) {
    const patch = await readConfigPatch(filePath);
    if (Result.isError(patch)) return patch;
    if (!patch.value) continue;

    config = mergeOrchestratorConfig(config, patch.value);
    loadedFrom.push(filePath);
  }

  return Result.ok({
    config: applyEnvironmentOverrides(config, env),
    paths,
    loadedFrom,
  });
}

export {
  PERMISSION_LEVELS,
  isPermissionLevel,
  parseOrchestratorConfigPatch,
  type AgentRegistryConfigPatch,
  type EpicCoordinatorConfigPatch,
  type OrchestratorConfigPatch,
  type PermissionLevel,
} from "./schema";
