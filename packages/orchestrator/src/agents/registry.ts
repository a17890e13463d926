import type { PermissionLevel } from "@taskforge/config";
import {
  OrchestratorRuntimeError,
  OrchestratorValidationError,
  type OrchestratorPolicyError,
  type OrchestratorResult,
} from "@taskforge/core/errors";
import { childLogger, createSilentLogger, type Logger } from "@taskforge/core/logger";
import { Result } from "better-result";
import { createPermissionGuard, type OperationRequest, type PermissionGuard } from "../policy";
import type { Agent, AgentRegistry, InMemoryAgentRegistryOptions } from "./types";

const DEFAULT_HEARTBEAT_TIMEOUT_MS = 1000 * 60 * 5;

/** Agent that `getOrCreate` resolves a blank id to. */
export const DEFAULT_AGENT_ID = "default-agent";

function toUnknownAgentError(agentId: string): OrchestratorRuntimeError {
  return new OrchestratorRuntimeError({
    code: "unknown_agent",
    stage: "agent_registry",
    message: `Unknown agent id '${agentId}'`,
    meta: { agentId },
  });
}

function toAgent(input: {
  readonly id: string;
  readonly capabilities: Iterable<string>;
  readonly permissionLevel: PermissionLevel;
  readonly registeredAtEpochMs: number;
  readonly lastHeartbeatEpochMs: number;
}): Agent {
  return Object.freeze({
    id: input.id,
    capabilities: new Set(input.capabilities),
    permissionLevel: input.permissionLevel,
    registeredAtEpochMs: input.registeredAtEpochMs,
    lastHeartbeatEpochMs: input.lastHeartbeatEpochMs,
  });
}

class InMemoryAgentRegistry implements AgentRegistry {
  private readonly agents = new Map<string, Agent>();
  private readonly now: () => number;
  private readonly heartbeatTimeoutMs: number;
  private readonly defaultCapabilities: readonly string[];
  private readonly defaultPermissionLevel: PermissionLevel;
  private readonly guard: PermissionGuard;
  private readonly logger: Logger;

  constructor(options: InMemoryAgentRegistryOptions = {}) {
    this.now = options.now ?? (() => Date.now());
    this.heartbeatTimeoutMs =
      options.heartbeatTimeoutMs !== undefined && options.heartbeatTimeoutMs > 0
        ? options.heartbeatTimeoutMs
        : DEFAULT_HEARTBEAT_TIMEOUT_MS;
    this.defaultCapabilities = options.defaultCapabilities ?? [];
    this.defaultPermissionLevel = options.defaultPermissionLevel ?? "isolated";
    this.guard = options.guard ?? createPermissionGuard();
    this.logger = childLogger(options.logger ?? createSilentLogger(), "agent_registry");
  }

  register(
    agentId: string,
    capabilities: Iterable<string>,
    permissionLevel: PermissionLevel,
  ): OrchestratorResult<Agent, OrchestratorRuntimeError | OrchestratorValidationError> {
    if (agentId.trim().length === 0) {
      return Result.err(
        new OrchestratorValidationError({
          code: "invalid_identifier",
          path: "agentId",
          message: "Agent id must be a non-empty string",
        }),
      );
    }

    if (this.agents.has(agentId)) {
      return Result.err(
        new OrchestratorRuntimeError({
          code: "duplicate_agent",
          stage: "agent_registry",
          message: `Agent id '${agentId}' already exists`,
          meta: { agentId },
        }),
      );
    }

    return Result.ok(this.insert(agentId, capabilities, permissionLevel));
  }

  heartbeat(agentId: string): OrchestratorResult<true, OrchestratorRuntimeError> {
    const current = this.agents.get(agentId);
    if (!current) return Result.err(toUnknownAgentError(agentId));

    this.agents.set(agentId, toAgent({ ...current, lastHeartbeatEpochMs: this.now() }));
    return Result.ok(true);
  }

  getOrCreate(
    agentId: string,
    defaultCapabilities: Iterable<string> = this.defaultCapabilities,
    defaultPermissionLevel: PermissionLevel = this.defaultPermissionLevel,
  ): Agent {
    const id = agentId.trim().length > 0 ? agentId : DEFAULT_AGENT_ID;
    const existing = this.agents.get(id);
    if (existing) return existing;
    return this.insert(id, defaultCapabilities, defaultPermissionLevel);
  }

  isHealthy(agentId: string, livenessTimeoutMs: number = this.heartbeatTimeoutMs): boolean {
    const agent = this.agents.get(agentId);
    if (!agent) return false;
    return this.now() - agent.lastHeartbeatEpochMs <= livenessTimeoutMs;
  }

  getAgent(agentId: string): Agent | undefined {
    return this.agents.get(agentId);
  }

  listAgents(): readonly Agent[] {
    return [...this.agents.values()];
  }

  listStaleAgents(livenessTimeoutMs: number = this.heartbeatTimeoutMs): readonly Agent[] {
    const now = this.now();
    return [...this.agents.values()].filter(
      (agent) => now - agent.lastHeartbeatEpochMs > livenessTimeoutMs,
    );
  }

  unregister(agentId: string): boolean {
    const removed = this.agents.delete(agentId);
    if (removed) this.logger.debug({ agentId }, "agent unregistered");
    return removed;
  }

  authorize(
    agentId: string,
    requests: readonly OperationRequest[],
  ): OrchestratorResult<true, OrchestratorPolicyError | OrchestratorRuntimeError> {
    const agent = this.agents.get(agentId);
    if (!agent) return Result.err(toUnknownAgentError(agentId));

    const decision = this.guard.evaluateAll(agent.permissionLevel, requests);
    if (Result.isError(decision)) {
      this.logger.warn(
        { agentId, level: agent.permissionLevel, action: decision.error.action },
        "operation denied",
      );
    }
    return decision;
  }

  private insert(
    agentId: string,
    capabilities: Iterable<string>,
    permissionLevel: PermissionLevel,
  ): Agent {
    const now = this.now();
    const agent = toAgent({
      id: agentId,
      capabilities,
      permissionLevel,
      registeredAtEpochMs: now,
      lastHeartbeatEpochMs: now,
    });

    this.agents.set(agentId, agent);
    this.logger.info({ agentId, permissionLevel }, "agent registered");
    return agent;
  }
}

export function createAgentRegistry(options: InMemoryAgentRegistryOptions = {}): AgentRegistry {
  return new InMemoryAgentRegistry(options);
}
