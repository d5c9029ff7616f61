import type { ImageTask, RunSummary } from "@/types/batch";

export function summarizeTasks(tasks: Pick<ImageTask, "status">[]): RunSummary {
  const summary: RunSummary = { total: tasks.length, succeeded: 0, failed: 0, pending: 0 };
  for (const task of tasks) {
    if (task.status === "succeeded") summary.succeeded++;
    else if (task.status === "failed") summary.failed++;
    else summary.pending++;
  }
  return summary;
}

export function describeSummary(summary: RunSummary): string {
  const parts = [`${summary.succeeded}/${summary.total} succeeded`];
  if (summary.failed > 0) parts.push(`${summary.failed} failed`);
  if (summary.pending > 0) parts.push(`${summary.pending} not processed`);
  return parts.join(", ");
}
