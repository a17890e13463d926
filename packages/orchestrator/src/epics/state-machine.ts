import type { SubTaskStatus } from "./types";

export function isTerminalStatus(status: SubTaskStatus): boolean {
  return status === "completed" || status === "failed";
}

export function isStatusTransitionAllowed(from: SubTaskStatus, to: SubTaskStatus): boolean {
  if (from === "pending") return to === "branch_created" || to === "failed";
  if (from === "branch_created") return to === "in_progress" || to === "failed";
  if (from === "in_progress") return to === "completed" || to === "failed";
  return false;
}

/** Statuses from which `executeSubTask` may start a run. */
export function isExecutableStatus(status: SubTaskStatus): boolean {
  return status === "pending" || status === "branch_created";
}
