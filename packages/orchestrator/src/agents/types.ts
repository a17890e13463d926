import type { PermissionLevel } from "@taskforge/config";
import type {
  OrchestratorPolicyError,
  OrchestratorResult,
  OrchestratorRuntimeError,
  OrchestratorValidationError,
} from "@taskforge/core/errors";
import type { Logger } from "@taskforge/core/logger";
import type { OperationRequest, PermissionGuard } from "../policy";

export interface Agent {
  readonly id: string;
  readonly capabilities: ReadonlySet<string>;
  readonly permissionLevel: PermissionLevel;
  readonly lastHeartbeatEpochMs: number;
  readonly registeredAtEpochMs: number;
}

export interface AgentRegistry {
  register(
    agentId: string,
    capabilities: Iterable<string>,
    permissionLevel: PermissionLevel,
  ): OrchestratorResult<Agent, OrchestratorRuntimeError | OrchestratorValidationError>;
  heartbeat(agentId: string): OrchestratorResult<true, OrchestratorRuntimeError>;
  getOrCreate(
    agentId: string,
    defaultCapabilities?: Iterable<string>,
    defaultPermissionLevel?: PermissionLevel,
  ): Agent;
  isHealthy(agentId: string, livenessTimeoutMs?: number): boolean;
  getAgent(agentId: string): Agent | undefined;
  listAgents(): readonly Agent[];
  listStaleAgents(livenessTimeoutMs?: number): readonly Agent[];
  unregister(agentId: string): boolean;
  authorize(
    agentId: string,
    requests: readonly OperationRequest[],
  ): OrchestratorResult<true, OrchestratorPolicyError | OrchestratorRuntimeError>;
}

export interface InMemoryAgentRegistryOptions {
  readonly now?: () => number;
  readonly heartbeatTimeoutMs?: number;
  readonly defaultCapabilities?: readonly string[];
  readonly defaultPermissionLevel?: PermissionLevel;
  readonly guard?: PermissionGuard;
  readonly logger?: Logger;
}
