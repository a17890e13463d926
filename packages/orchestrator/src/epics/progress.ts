import { isTerminalStatus } from "./state-machine";
import {
  SUB_TASK_STATUSES,
  type Epic,
  type EpicProgress,
  type SubTaskAssignment,
  type SubTaskFailure,
  type SubTaskStatus,
} from "./types";

function emptyCounts(): Record<SubTaskStatus, number> {
  const counts: Record<SubTaskStatus, number> = {
    pending: 0,
    branch_created: 0,
    in_progress: 0,
    completed: 0,
    failed: 0,
  };
  return counts;
}

export function summarizeEpicProgress(
  epic: Epic,
  assignments: readonly SubTaskAssignment[],
): EpicProgress {
  const counts = emptyCounts();
  const failures: SubTaskFailure[] = [];
  const bySubTask = new Map(assignments.map((assignment) => [assignment.subTaskId, assignment]));

  let unassigned = 0;
  let terminal = 0;

  for (const subTaskId of epic.subTaskIds) {
    const assignment = bySubTask.get(subTaskId);
    if (!assignment) {
      unassigned += 1;
      continue;
    }

    counts[assignment.status] += 1;
    if (isTerminalStatus(assignment.status)) terminal += 1;

    if (assignment.status === "failed") {
      failures.push({
        subTaskId,
        ...(assignment.errorCode !== undefined ? { errorCode: assignment.errorCode } : {}),
        errorMessage: assignment.errorMessage ?? "Unknown failure",
      });
    }
  }

  const totalSubTasks = epic.subTaskIds.length;

  return {
    epicId: epic.epicId,
    totalSubTasks,
    unassigned,
    counts,
    completionRatio: totalSubTasks === 0 ? 0 : counts.completed / totalSubTasks,
    settled: totalSubTasks > 0 && terminal === totalSubTasks,
    failures,
  };
}

export function formatEpicProgress(progress: EpicProgress): string {
  const parts = SUB_TASK_STATUSES.filter((status) => progress.counts[status] > 0).map(
    (status) => `${status}=${progress.counts[status]}`,
  );
  if (progress.unassigned > 0) parts.push(`unassigned=${progress.unassigned}`);

  const percent = Math.round(progress.completionRatio * 100);
  return `${progress.epicId}: ${percent}% complete (${parts.join(", ")})`;
}
