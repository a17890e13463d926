export type { Agent, AgentRegistry, InMemoryAgentRegistryOptions } from "./types";
export { DEFAULT_AGENT_ID, createAgentRegistry } from "./registry";
