export {
  OrchestratorCancelledError,
  OrchestratorPolicyError,
  OrchestratorRuntimeError,
  OrchestratorValidationError,
  WorkFunctionError,
  isOrchestratorError,
  messageFromCause,
} from "./errors";
export type {
  OrchestratorError,
  OrchestratorErrorCode,
  OrchestratorErrorMeta,
  OrchestratorResult,
  OrchestratorRuntimeCode,
  OrchestratorValidationCode,
} from "./errors";
export {
  ORCHESTRATOR_LOG_LEVELS,
  childLogger,
  createOrchestratorLogger,
  createSilentLogger,
  isOrchestratorLogLevel,
} from "./logger";
export type { CreateOrchestratorLoggerOptions, Logger, OrchestratorLogLevel } from "./logger";
