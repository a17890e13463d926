import { DEFAULT_ORCHESTRATOR_CONFIG, type OrchestratorRuntimeConfig } from "@taskforge/config";
import { createOrchestratorLogger, type Logger } from "@taskforge/core/logger";
import { createAgentRegistry, type AgentRegistry } from "./agents";
import { createEpicCoordinator, type EpicCoordinator, type EpicCoordinatorOptions } from "./epics";
import { createPermissionGuard, type PermissionGuard } from "./policy";

export interface OrchestratorRuntime {
  readonly config: OrchestratorRuntimeConfig;
  readonly logger: Logger;
  readonly guard: PermissionGuard;
  readonly registry: AgentRegistry;
  readonly coordinator: EpicCoordinator;
}

export interface CreateOrchestratorRuntimeOptions
  extends Pick<
    EpicCoordinatorOptions,
    "now" | "branchOptions" | "resolveBranchResources" | "onAssignmentUpdate"
  > {
  readonly logger?: Logger;
}

/** Wires guard, registry and coordinator from one loaded runtime config. */
export function createOrchestratorRuntime(
  config: OrchestratorRuntimeConfig = DEFAULT_ORCHESTRATOR_CONFIG,
  options: CreateOrchestratorRuntimeOptions = {},
): OrchestratorRuntime {
  const logger = options.logger ?? createOrchestratorLogger({ level: config.logLevel });
  const guard = createPermissionGuard({ workingDirectory: config.coordinator.workingDirectory });
  const registry = createAgentRegistry({
    now: options.now,
    heartbeatTimeoutMs: config.agents.heartbeatTimeoutMs,
    defaultCapabilities: config.agents.defaultCapabilities,
    defaultPermissionLevel: config.coordinator.defaultPermissionLevel,
    guard,
    logger,
  });

  const coordinator = createEpicCoordinator({
    config: config.coordinator,
    registry,
    guard,
    logger,
    now: options.now,
    branchOptions: options.branchOptions,
    resolveBranchResources: options.resolveBranchResources,
    onAssignmentUpdate: options.onAssignmentUpdate,
  });

  return { config, logger, guard, registry, coordinator };
}
