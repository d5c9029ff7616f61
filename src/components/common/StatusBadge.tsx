"use client";

import type { RunStatus, TaskStatus } from "@/types/batch";

const statusConfig: Record<TaskStatus | RunStatus, { label: string; className: string }> = {
  idle: { label: "Idle", className: "bg-muted text-muted-foreground" },
  pending: { label: "Pending", className: "bg-muted text-muted-foreground" },
  running: { label: "Processing", className: "bg-primary/10 text-primary animate-pulse" },
  succeeded: { label: "Done", className: "bg-green-100 text-green-700" },
  failed: { label: "Failed", className: "bg-red-100 text-red-700" },
  completed: { label: "Completed", className: "bg-green-100 text-green-700" },
  cancelled: { label: "Cancelled", className: "bg-amber-100 text-amber-700" },
};

export function StatusBadge({ status }: { status: TaskStatus | RunStatus }) {
  const config = statusConfig[status];
  return (
    <span className={`inline-flex items-center rounded-full px-2 py-0.5 text-xs font-medium ${config.className}`}>
      {config.label}
    </span>
  );
}
