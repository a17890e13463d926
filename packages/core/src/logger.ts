import { pino, type Logger, type LevelWithSilent } from "pino";

export type OrchestratorLogLevel = LevelWithSilent;

export const ORCHESTRATOR_LOG_LEVELS: readonly OrchestratorLogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

export interface CreateOrchestratorLoggerOptions {
  readonly level?: OrchestratorLogLevel;
  /** Bindings attached to every line, merged over `service`. */
  readonly base?: Record<string, unknown>;
}

export function isOrchestratorLogLevel(value: unknown): value is OrchestratorLogLevel {
  return typeof value === "string" && ORCHESTRATOR_LOG_LEVELS.some((level) => level === value);
}

export function createOrchestratorLogger(options: CreateOrchestratorLoggerOptions = {}): Logger {
  return pino({
    level: options.level ?? "info",
    base: {
      service: "taskforge",
      ...options.base,
    },
  });
}

/** Logger for components constructed without one; writes nothing. */
export function createSilentLogger(): Logger {
  return createOrchestratorLogger({ level: "silent" });
}

export function childLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}

export type { Logger };
